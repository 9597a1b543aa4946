import { z } from 'zod'
import type { PlaylistCollections, PlaylistItem, PlaylistProvider, Provider, Result, Track } from '@/types'
import type { BackendClient } from './api'
import { isPlaylistProvider, wireKeyOf } from './providers'

// Wire shapes (what the backend sends and receives)

export const TrackWireSchema = z.object({
    title: z.string(),
    artist: z.string(),
    isrc: z.string().nullable().optional()
})

export const PlaylistWireSchema = z.object({
    id: z.string(),
    name: z.string(),
    cover: z.string(),
    track_count: z.number().int().nonnegative(),
    tracks: z.array(TrackWireSchema)
})

export const PlaylistListWireSchema = z.array(PlaylistWireSchema)

export type TrackWire = z.infer<typeof TrackWireSchema>
export type PlaylistWire = z.infer<typeof PlaylistWireSchema>

function toTrack(wire: TrackWire): Track {
    return wire.isrc
        ? { title: wire.title, artist: wire.artist, isrc: wire.isrc }
        : { title: wire.title, artist: wire.artist }
}

export function fromWire(wire: PlaylistWire): PlaylistItem {
    return {
        id: wire.id,
        name: wire.name,
        coverUrl: wire.cover,
        trackCount: wire.track_count,
        selected: false,
        tracks: wire.tracks.map(toTrack)
    }
}

export function toWire(item: PlaylistItem): PlaylistWire {
    return {
        id: item.id,
        name: item.name,
        cover: item.coverUrl,
        track_count: item.trackCount,
        tracks: item.tracks.map(track => ({
            title: track.title,
            artist: track.artist,
            isrc: track.isrc ?? null
        }))
    }
}

// One bad record rejects the whole list
export function normalizePlaylists(body: unknown): Result<PlaylistItem[]> {
    const parsed = PlaylistListWireSchema.safeParse(body)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid playlist list'
        return { ok: false, error: { kind: 'decode', message: where } }
    }
    return { ok: true, value: parsed.data.map(fromWire) }
}

export async function fetchPlaylists(api: BackendClient, provider: Provider): Promise<Result<PlaylistItem[]>> {
    if (!isPlaylistProvider(provider)) {
        return { ok: false, error: { kind: 'unsupported', message: `${wireKeyOf(provider)} has no playlist endpoint` } }
    }

    const result = await api.playlists(provider)
    if (!result.ok) return result
    return normalizePlaylists(result.value)
}

export function emptyCollections(): PlaylistCollections {
    return { APPLE: [], SPOTIFY: [], YOUTUBE: [] }
}

export function collectionOf(collections: PlaylistCollections, provider: Provider): PlaylistItem[] {
    return isPlaylistProvider(provider) ? collections[provider] : []
}

/**
 * The per-provider playlist collections plus the loading flag and the last
 * failure kept for diagnostics. Collections are never merged.
 */
export class PlaylistStore {
    private collections: PlaylistCollections = emptyCollections()
    private generations: Record<PlaylistProvider, number> = { APPLE: 0, SPOTIFY: 0, YOUTUBE: 0 }
    private loadingProvider: Provider | null = null
    private lastError: string | null = null

    constructor(
        private readonly api: BackendClient,
        private readonly onChange: () => void = () => {}
    ) {}

    getCollections(): PlaylistCollections {
        return this.collections
    }

    get(provider: Provider): PlaylistItem[] {
        return collectionOf(this.collections, provider)
    }

    isLoading(): boolean {
        return this.loadingProvider !== null
    }

    getLastError(): string | null {
        return this.lastError
    }

    replace(provider: Provider, items: PlaylistItem[]): void {
        if (!isPlaylistProvider(provider)) return
        this.collections = { ...this.collections, [provider]: items }
        this.onChange()
    }

    /**
     * Fetches the provider's playlists. The result only commits when this is still the
     * latest fetch for the provider and `isCurrent` still holds once it arrives;
     * failures commit an empty list.
     */
    async load(provider: Provider, isCurrent: () => boolean = () => true): Promise<Result<PlaylistItem[]>> {
        const generation = isPlaylistProvider(provider) ? ++this.generations[provider] : 0
        this.loadingProvider = provider
        this.onChange()

        const result = await fetchPlaylists(this.api, provider)

        const stale = isPlaylistProvider(provider) && generation !== this.generations[provider]
        if (stale || !isCurrent()) {
            console.log(`[playlists] Dropping stale ${wireKeyOf(provider)} playlists`)
            if (this.loadingProvider === provider && !stale) {
                this.loadingProvider = null
                this.onChange()
            }
            return result
        }

        if (result.ok) {
            this.lastError = null
            console.log(`[playlists] Loaded ${result.value.length} ${wireKeyOf(provider)} playlists`)
        } else {
            this.lastError = `${result.error.kind}: ${result.error.message}`
            console.error(`[playlists] Failed to load ${wireKeyOf(provider)} playlists:`, result.error.message)
        }

        this.loadingProvider = null
        if (isPlaylistProvider(provider)) {
            this.collections = { ...this.collections, [provider]: result.ok ? result.value : [] }
        }
        this.onChange()
        return result
    }
}
