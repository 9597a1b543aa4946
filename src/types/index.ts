
// Provider identity
export type Provider = 'APPLE' | 'SPOTIFY' | 'YOUTUBE' | 'AMAZON'

// Wire key used in the address bar, backend paths and the login status map
export type WireKey = 'apple' | 'spotify' | 'youtube' | 'amazon'

export interface ProviderMeta {
    name: string
    icon: string
    loginLabel: string
    wireKey: WireKey
}

// Navigable state, serialized into the address bar
export interface Session {
    sourceCandidates: Provider[]
    destinationCandidates: Provider[]
    activeSourceIndex: number
}

export type AuthStatus = Partial<Record<WireKey, boolean>>

export interface Track {
    title: string
    artist: string
    isrc?: string
}

export interface PlaylistItem {
    id: string
    name: string
    coverUrl: string
    trackCount: number // reported by the provider, not tracks.length
    selected: boolean
    tracks: Track[]
}

// Providers that have a playlist collection of their own
export type PlaylistProvider = 'APPLE' | 'SPOTIFY' | 'YOUTUBE'

export type PlaylistCollections = Record<PlaylistProvider, PlaylistItem[]>

export type Stage = 'HOME' | 'LIST' | 'DONE'

// Error Types
export type FailureKind = 'transport' | 'status' | 'decode' | 'unsupported'

export interface FetchFailure {
    kind: FailureKind
    message: string
}

export type Result<T> =
    | { ok: true, value: T }
    | { ok: false, error: FetchFailure }

// Transfer Types
export interface TransferOutcome {
    id: string
    ok: boolean
    error?: FetchFailure
}

export interface TransferBatch {
    destination: Provider
    items: PlaylistItem[]
    outcomes: Promise<TransferOutcome>[]
    allSettled: Promise<TransferOutcome[]>
}

export type AppleLoginPhase = 'IDLE' | 'AWAITING_TOKEN' | 'REGISTERING'
