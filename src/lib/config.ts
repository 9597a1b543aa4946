// Client configuration, read from NEXT_PUBLIC_* variables at build time

export interface AppConfig {
    appOrigin: string
    spotifyClientId: string | null
    youtubeClientId: string | null
    amazonClientId: string | null
    appleServiceId: string | null
    // null means every transfer request is issued at once
    transferConcurrency: number | null
    appleRetryMs: number
}

export type EnvRecord = Record<string, string | undefined>

const DEFAULT_APPLE_RETRY_MS = 100

function optional(value: string | undefined): string | null {
    const trimmed = value?.trim()
    return trimmed ? trimmed : null
}

function positiveInt(value: string | undefined): number | null {
    if (!value || !/^\d+$/.test(value.trim())) return null
    const parsed = parseInt(value.trim(), 10)
    return parsed > 0 ? parsed : null
}

function resolveOrigin(configured: string | null): string {
    if (configured) return configured.replace(/\/+$/, '')
    if (typeof window !== 'undefined') return window.location.origin
    return 'http://localhost:3000'
}

export function loadConfig(env: EnvRecord): AppConfig {
    return {
        appOrigin: resolveOrigin(optional(env.NEXT_PUBLIC_APP_ORIGIN)),
        spotifyClientId: optional(env.NEXT_PUBLIC_SPOTIFY_CLIENT_ID),
        youtubeClientId: optional(env.NEXT_PUBLIC_YOUTUBE_CLIENT_ID),
        amazonClientId: optional(env.NEXT_PUBLIC_AMAZON_CLIENT_ID),
        appleServiceId: optional(env.NEXT_PUBLIC_APPLE_SERVICE_ID),
        transferConcurrency: positiveInt(env.NEXT_PUBLIC_TRANSFER_CONCURRENCY),
        appleRetryMs: positiveInt(env.NEXT_PUBLIC_APPLE_RETRY_MS) ?? DEFAULT_APPLE_RETRY_MS
    }
}

// Next.js only inlines NEXT_PUBLIC_* values that are referenced by their full name
export const config = loadConfig({
    NEXT_PUBLIC_APP_ORIGIN: process.env.NEXT_PUBLIC_APP_ORIGIN,
    NEXT_PUBLIC_SPOTIFY_CLIENT_ID: process.env.NEXT_PUBLIC_SPOTIFY_CLIENT_ID,
    NEXT_PUBLIC_YOUTUBE_CLIENT_ID: process.env.NEXT_PUBLIC_YOUTUBE_CLIENT_ID,
    NEXT_PUBLIC_AMAZON_CLIENT_ID: process.env.NEXT_PUBLIC_AMAZON_CLIENT_ID,
    NEXT_PUBLIC_APPLE_SERVICE_ID: process.env.NEXT_PUBLIC_APPLE_SERVICE_ID,
    NEXT_PUBLIC_TRANSFER_CONCURRENCY: process.env.NEXT_PUBLIC_TRANSFER_CONCURRENCY,
    NEXT_PUBLIC_APPLE_RETRY_MS: process.env.NEXT_PUBLIC_APPLE_RETRY_MS
})
