import type { Session, Stage } from '@/types'
import { encodeSession } from './session'

const STAGE_PATHS: Record<Stage, string> = {
    HOME: '/',
    LIST: '/list',
    DONE: '/done'
}

/**
 * Normalizes a path to always start with `/` and never end with `/` (unless root)
 */
function normalizePath(path: string): string {
    if (!path) return '/'
    const withLeading = path.startsWith('/') ? path : `/${path}`
    if (withLeading.length > 1 && withLeading.endsWith('/')) {
        return withLeading.slice(0, -1)
    }
    return withLeading
}

// Unknown paths render Home
export function stageOf(pathname: string): Stage {
    const cleaned = normalizePath(pathname)
    if (cleaned === STAGE_PATHS.LIST) return 'LIST'
    if (cleaned === STAGE_PATHS.DONE) return 'DONE'
    return 'HOME'
}

export function pathOf(stage: Stage): string {
    return STAGE_PATHS[stage]
}

export function hrefFor(stage: Stage, session: Session): string {
    return `${pathOf(stage)}?${encodeSession(session)}`
}
