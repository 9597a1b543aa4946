import type { AppleLoginPhase } from '@/types'
import type { BackendClient } from './api'

// Native host contract: a zero-argument login trigger out, a token string in.
export interface NativeBridge {
    isAvailable(): boolean
    requestLogin(): void
    onToken(listener: (token: string) => void): () => void
}

declare global {
    interface Window {
        webkit?: {
            messageHandlers?: Record<string, { postMessage(message: unknown): void } | undefined>
        }
        receiveAppleUserToken?: (token: string) => void
    }
}

const LOGIN_HANDLER = 'appleLogin'

/**
 * WKWebView bridge: login goes out through `webkit.messageHandlers.appleLogin`,
 * the app calls `window.receiveAppleUserToken(token)` when MusicKit hands one over.
 */
export function createWebkitBridge(win: Window): NativeBridge {
    const listeners = new Set<(token: string) => void>()

    return {
        isAvailable() {
            return win.webkit?.messageHandlers?.[LOGIN_HANDLER] !== undefined
        },
        requestLogin() {
            const handler = win.webkit?.messageHandlers?.[LOGIN_HANDLER]
            if (!handler) {
                console.warn('[apple] No native login handler available')
                return
            }
            handler.postMessage(null)
        },
        onToken(listener) {
            listeners.add(listener)
            win.receiveAppleUserToken = (token: string) => {
                listeners.forEach(l => l(token))
            }
            return () => {
                listeners.delete(listener)
                if (listeners.size === 0) {
                    delete win.receiveAppleUserToken
                }
            }
        }
    }
}

export interface AppleHandshakeOptions {
    retryMs?: number
    onPhaseChange?: (phase: AppleLoginPhase) => void
}

interface AuthRefresher {
    refresh(): Promise<unknown>
}

/**
 * Idle -> AwaitingToken -> Registering -> Idle.
 *
 * The first native trigger sometimes never shows the prompt, so login re-triggers
 * once after `retryMs`. That can deliver the same token twice; a token that was
 * already registered is ignored.
 */
export class AppleTokenHandshake {
    private phase: AppleLoginPhase = 'IDLE'
    private retryTimer: ReturnType<typeof setTimeout> | null = null
    private readonly registered = new Set<string>()
    private inFlight: string | null = null
    private pending: string | null = null
    private busy = false
    private unsubscribe: (() => void) | null = null
    private readonly retryMs: number
    private readonly onPhaseChange: (phase: AppleLoginPhase) => void

    constructor(
        private readonly bridge: NativeBridge,
        private readonly api: BackendClient,
        private readonly auth: AuthRefresher,
        options: AppleHandshakeOptions = {}
    ) {
        this.retryMs = options.retryMs ?? 100
        this.onPhaseChange = options.onPhaseChange ?? (() => {})
    }

    getPhase(): AppleLoginPhase {
        return this.phase
    }

    private setPhase(phase: AppleLoginPhase): void {
        if (this.phase === phase) return
        this.phase = phase
        this.onPhaseChange(phase)
    }

    // Starts listening for tokens; they may arrive at any time, prompted or not
    attach(): void {
        if (this.unsubscribe) return
        this.unsubscribe = this.bridge.onToken(token => {
            this.receiveToken(token).catch((error: unknown) => {
                console.error('[apple] Token handling failed:', error instanceof Error ? error.message : 'Unknown error')
            })
        })
    }

    detach(): void {
        this.clearRetry()
        this.unsubscribe?.()
        this.unsubscribe = null
    }

    login(): void {
        // A new login may hand back the token registered before a logout
        this.registered.clear()
        this.pending = null
        if (this.phase !== 'REGISTERING') {
            this.setPhase('AWAITING_TOKEN')
        }

        this.clearRetry()
        this.retryTimer = setTimeout(() => {
            this.retryTimer = null
            if (this.phase === 'AWAITING_TOKEN') {
                console.log('[apple] Re-triggering native login')
                this.bridge.requestLogin()
            }
        }, this.retryMs)
        this.bridge.requestLogin()
    }

    // Forgets registered tokens and stops waiting; a registration in flight still finishes
    reset(): void {
        this.clearRetry()
        this.registered.clear()
        this.pending = null
        if (!this.busy) this.setPhase('IDLE')
    }

    private clearRetry(): void {
        if (this.retryTimer !== null) {
            clearTimeout(this.retryTimer)
            this.retryTimer = null
        }
    }

    async receiveToken(token: string): Promise<void> {
        if (!token) return

        if (this.registered.has(token) || token === this.inFlight) {
            console.log('[apple] Ignoring duplicate user token')
            return
        }

        if (this.busy) {
            this.pending = token
            return
        }

        this.busy = true
        this.clearRetry()
        try {
            let current: string | null = token
            while (current !== null) {
                await this.register(current)
                current = this.takePending()
            }
        } finally {
            this.busy = false
            this.setPhase('IDLE')
        }
    }

    private takePending(): string | null {
        const token = this.pending
        this.pending = null
        if (token !== null && this.registered.has(token)) return null
        return token
    }

    private async register(token: string): Promise<void> {
        this.inFlight = token
        this.setPhase('REGISTERING')

        const result = await this.api.registerAppleUserToken(token)
        if (result.ok) {
            this.registered.add(token)
        } else {
            console.warn('[apple] Registering user token failed:', result.error.message)
        }

        // Success or not, the backend is the judge of the login state
        await this.auth.refresh()
        this.inFlight = null
    }
}
