import type { Provider, Session } from '@/types'
import { PROVIDERS, providerOf, wireKeyOf } from './providers'

// Session codec: the address bar is the store, this module is its serializer.
//   ?left=<csv wire keys>&right=<csv wire keys>&li=<int>

export const DEFAULT_SOURCES: readonly Provider[] = ['YOUTUBE', 'APPLE', 'AMAZON']
export const DEFAULT_DESTINATIONS: readonly Provider[] = ['SPOTIFY']
export const DEFAULT_ACTIVE_INDEX = 1

export function defaultSession(): Session {
    return {
        sourceCandidates: [...DEFAULT_SOURCES],
        destinationCandidates: [...DEFAULT_DESTINATIONS],
        activeSourceIndex: DEFAULT_ACTIVE_INDEX
    }
}

export function activeSource(session: Session): Provider {
    return session.sourceCandidates[session.activeSourceIndex]
}

export function activeDestination(session: Session): Provider {
    return session.destinationCandidates[0]
}

function clampIndex(index: number, length: number): number {
    if (length <= 0) return 0
    return Math.min(Math.max(index, 0), length - 1)
}

// Unknown tokens and repeats are dropped, first occurrence wins
function parseProviderList(csv: string): Provider[] {
    const providers: Provider[] = []
    for (const token of csv.split(',')) {
        const provider = providerOf(token)
        if (provider && !providers.includes(provider)) {
            providers.push(provider)
        }
    }
    return providers
}

function parseIndex(raw: string | null): number {
    if (raw === null || !/^-?\d+$/.test(raw.trim())) {
        return DEFAULT_ACTIVE_INDEX
    }
    return parseInt(raw.trim(), 10)
}

function toSearchParams(input: string | URLSearchParams): URLSearchParams {
    if (typeof input !== 'string') return input

    let query = input
    const hashAt = query.indexOf('#')
    if (hashAt >= 0) query = query.slice(0, hashAt)
    const queryAt = query.indexOf('?')
    if (queryAt >= 0) query = query.slice(queryAt + 1)

    return new URLSearchParams(query)
}

export function encodeSession(session: Session): string {
    const left = session.sourceCandidates.map(wireKeyOf).join(',')
    const right = session.destinationCandidates.map(wireKeyOf).join(',')
    return `left=${left}&right=${right}&li=${session.activeSourceIndex}`
}

/**
 * Rebuilds a session from a URL, a query string or parsed search params.
 * Never fails: anything unusable falls back to the defaults and the result
 * always has disjoint lists and an in-range active index.
 */
export function decodeSession(input: string | URLSearchParams): Session {
    const params = toSearchParams(input)
    const leftRaw = params.get('left')
    const rightRaw = params.get('right')

    let destinations = rightRaw === null ? [...DEFAULT_DESTINATIONS] : parseProviderList(rightRaw)
    let sources = (leftRaw === null ? [...DEFAULT_SOURCES] : parseProviderList(leftRaw))
        .filter(provider => !destinations.includes(provider))

    if (sources.length === 0) {
        sources = DEFAULT_SOURCES.filter(provider => !destinations.includes(provider))
        if (sources.length === 0) {
            sources = [...DEFAULT_SOURCES]
            destinations = [...DEFAULT_DESTINATIONS]
        }
    }

    if (destinations.length === 0) {
        const fallback = [...DEFAULT_DESTINATIONS, ...PROVIDERS]
            .find(provider => !sources.includes(provider))
        if (fallback) {
            destinations = [fallback]
        } else {
            // every provider is a source candidate, borrow the last one
            destinations = sources.slice(-1)
            sources = sources.slice(0, -1)
        }
    }

    return {
        sourceCandidates: sources,
        destinationCandidates: destinations,
        activeSourceIndex: clampIndex(parseIndex(params.get('li')), sources.length)
    }
}

export function canPrevious(session: Session): boolean {
    return session.activeSourceIndex > 0
}

export function canNext(session: Session): boolean {
    return session.activeSourceIndex < session.sourceCandidates.length - 1
}

export function previous(session: Session): Session {
    if (!canPrevious(session)) return session
    return { ...session, activeSourceIndex: session.activeSourceIndex - 1 }
}

export function next(session: Session): Session {
    if (!canNext(session)) return session
    return { ...session, activeSourceIndex: session.activeSourceIndex + 1 }
}

// Active destination takes the active source's slot, the old source becomes destination 0
export function swap(session: Session): Session {
    const source = activeSource(session)
    const destination = activeDestination(session)
    if (source === undefined || destination === undefined) return session

    const sourceCandidates = [...session.sourceCandidates]
    const destinationCandidates = [...session.destinationCandidates]
    sourceCandidates[session.activeSourceIndex] = destination
    destinationCandidates[0] = source

    return { ...session, sourceCandidates, destinationCandidates }
}

// Handed to the provider as `state`; the login callback redirects to `/?<state>`.
// Percent-encoding happens once, where the authorize URL is assembled.
export function buildOAuthState(session: Session): string {
    return encodeSession(session)
}

export function parseOAuthState(state: string): Session {
    let raw = state
    try {
        raw = decodeURIComponent(state)
    } catch (error) {
        console.warn('[session] Malformed OAuth state, using it verbatim:', error instanceof Error ? error.message : 'Unknown error')
    }
    if (raw.startsWith('state=')) raw = raw.slice('state='.length)
    return decodeSession(raw.startsWith('?') ? raw : `?${raw}`)
}
