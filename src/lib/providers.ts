import type { PlaylistProvider, Provider, ProviderMeta, WireKey } from '@/types'

export const PROVIDERS: readonly Provider[] = ['APPLE', 'SPOTIFY', 'YOUTUBE', 'AMAZON']

const PROVIDER_META: Record<Provider, ProviderMeta> = {
    APPLE: {
        name: 'Apple Music',
        icon: '/Buttons/Apple.png',
        loginLabel: 'Login to Apple Music',
        wireKey: 'apple'
    },
    SPOTIFY: {
        name: 'Spotify',
        icon: '/Buttons/Spotify.png',
        loginLabel: 'Login to Spotify',
        wireKey: 'spotify'
    },
    YOUTUBE: {
        name: 'YouTube Music',
        icon: '/Buttons/YT.png',
        loginLabel: 'Login to YouTube',
        wireKey: 'youtube'
    },
    AMAZON: {
        name: 'Amazon Music',
        icon: '/Buttons/Amazon.png',
        loginLabel: 'Login to Amazon',
        wireKey: 'amazon'
    }
}

export function metadataOf(provider: Provider): ProviderMeta {
    return PROVIDER_META[provider]
}

export function wireKeyOf(provider: Provider): WireKey {
    return PROVIDER_META[provider].wireKey
}

// Unknown keys resolve to null instead of throwing
export function providerOf(wireKey: string): Provider | null {
    return PROVIDERS.find(provider => PROVIDER_META[provider].wireKey === wireKey) ?? null
}

export function isPlaylistProvider(provider: Provider): provider is PlaylistProvider {
    return provider !== 'AMAZON'
}
