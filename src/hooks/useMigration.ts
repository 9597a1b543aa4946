'use client'

import { createContext, useContext, useSyncExternalStore } from 'react'
import type { MigrationController, MigrationState } from '@/lib/migration'

export const MigrationContext = createContext<MigrationController | null>(null)

export function useMigration(): { controller: MigrationController, state: MigrationState } {
    const controller = useContext(MigrationContext)
    if (!controller) {
        throw new Error('useMigration must be used inside <MigrationProvider>')
    }
    const state = useSyncExternalStore(controller.subscribe, controller.getSnapshot, controller.getSnapshot)
    return { controller, state }
}
