import type { Provider, Session } from '@/types'
import type { AppConfig } from './config'
import { wireKeyOf } from './providers'
import { buildOAuthState } from './session'

interface AuthorizeEndpoint {
    url: string
    clientId: (config: AppConfig) => string | null
    params: Record<string, string>
}

const AUTHORIZE_ENDPOINTS: Record<Provider, AuthorizeEndpoint> = {
    SPOTIFY: {
        url: 'https://accounts.spotify.com/authorize',
        clientId: config => config.spotifyClientId,
        params: {
            response_type: 'code',
            scope: [
                'playlist-read-private',
                'playlist-read-collaborative',
                'playlist-modify-private',
                'playlist-modify-public'
            ].join(' ')
        }
    },
    YOUTUBE: {
        url: 'https://accounts.google.com/o/oauth2/v2/auth',
        clientId: config => config.youtubeClientId,
        params: {
            response_type: 'code',
            scope: 'https://www.googleapis.com/auth/youtube',
            access_type: 'offline',
            prompt: 'consent'
        }
    },
    AMAZON: {
        url: 'https://www.amazon.com/ap/oa',
        clientId: config => config.amazonClientId,
        params: {
            response_type: 'code',
            scope: 'profile'
        }
    },
    // Sign in with Apple posts the callback as a form, state included
    APPLE: {
        url: 'https://appleid.apple.com/auth/authorize',
        clientId: config => config.appleServiceId,
        params: {
            response_type: 'code',
            response_mode: 'form_post',
            scope: 'name email'
        }
    }
}

export function callbackUrl(provider: Provider, config: AppConfig): string {
    return `${config.appOrigin}/api/login/${wireKeyOf(provider)}/callback`
}

/**
 * Provider authorize URL. The session travels in `state` so the callback can put
 * the user back where they were; it is percent-encoded exactly once, by URLSearchParams.
 * Returns null when the provider has no client id configured.
 */
export function loginUrl(provider: Provider, session: Session, config: AppConfig): string | null {
    const endpoint = AUTHORIZE_ENDPOINTS[provider]
    const clientId = endpoint.clientId(config)
    if (!clientId) return null

    const params = new URLSearchParams({
        client_id: clientId,
        redirect_uri: callbackUrl(provider, config),
        ...endpoint.params,
        state: buildOAuthState(session)
    })

    return `${endpoint.url}?${params.toString()}`
}
