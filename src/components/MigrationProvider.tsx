'use client'

import { type ReactNode, useEffect, useRef, useState } from 'react'
import { usePathname, useRouter, useSearchParams } from 'next/navigation'
import { backend } from '@/lib/api'
import { createWebkitBridge } from '@/lib/apple'
import { config } from '@/lib/config'
import { MigrationController } from '@/lib/migration'
import { MigrationContext } from '@/hooks/useMigration'

export default function MigrationProvider({ children }: { children: ReactNode }) {
    const router = useRouter()
    const pathname = usePathname()
    const searchParams = useSearchParams()

    // The controller outlives router instances, so it navigates through a ref
    const pushRef = useRef<(href: string) => void>(href => router.push(href))
    pushRef.current = href => router.push(href)

    const [controller] = useState(() => new MigrationController({
        api: backend,
        config,
        bridge: typeof window !== 'undefined' ? createWebkitBridge(window) : null,
        navigate: href => pushRef.current(href)
    }))

    useEffect(() => {
        controller.start()
        return () => controller.stop()
    }, [controller])

    useEffect(() => {
        controller.applyLocation(pathname ?? '/', searchParams?.toString() ?? '').catch((error: unknown) => {
            console.error('[session] Navigation handling failed:', error instanceof Error ? error.message : 'Unknown error')
        })
    }, [controller, pathname, searchParams])

    return (
        <MigrationContext.Provider value={controller}>
            {children}
        </MigrationContext.Provider>
    )
}
