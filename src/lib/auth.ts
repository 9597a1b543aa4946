import { z } from 'zod'
import type { AuthStatus, Provider, Session, WireKey } from '@/types'
import type { BackendClient } from './api'
import { PROVIDERS, wireKeyOf } from './providers'
import { activeDestination, activeSource } from './session'

const LoginStatusSchema = z.record(z.string(), z.boolean())

export function parseLoginStatus(body: unknown): AuthStatus | null {
    const parsed = LoginStatusSchema.safeParse(body)
    if (!parsed.success) return null

    const status: AuthStatus = {}
    for (const provider of PROVIDERS) {
        const key: WireKey = wireKeyOf(provider)
        const value = parsed.data[key]
        if (value !== undefined) status[key] = value
    }
    return status
}

/**
 * Per-provider login status as last reported by the backend.
 * Refreshes replace the whole map; a failed refresh keeps the previous one.
 */
export class AuthGate {
    private status: AuthStatus = {}
    // Bumped by every refresh and logout so an older response never lands on top of a newer state
    private generation = 0
    private lastError: string | null = null

    constructor(
        private readonly api: BackendClient,
        private readonly onChange: (status: AuthStatus) => void = () => {}
    ) {}

    getStatus(): AuthStatus {
        return this.status
    }

    getLastError(): string | null {
        return this.lastError
    }

    private replace(status: AuthStatus): void {
        this.status = status
        this.onChange(status)
    }

    async refresh(): Promise<AuthStatus> {
        const generation = ++this.generation
        const result = await this.api.loginStatus()

        if (generation !== this.generation) {
            return this.status
        }

        if (!result.ok) {
            this.lastError = result.error.message
            console.warn('[auth] Login status refresh failed, keeping previous status:', result.error.message)
            return this.status
        }

        const status = parseLoginStatus(result.value)
        if (!status) {
            this.lastError = 'Login status response is not a map of booleans'
            console.warn('[auth] Ignoring malformed login status response')
            return this.status
        }

        this.lastError = null
        this.replace(status)
        return status
    }

    // Clears locally right away; the backend call only triggers a follow-up refresh
    logoutAll(): Promise<AuthStatus> {
        this.generation++
        this.replace({})
        return this.api.logoutAll().then(result => {
            if (!result.ok) {
                console.warn('[auth] Logout request failed:', result.error.message)
            }
            return this.refresh()
        })
    }

    logout(provider: Provider): Promise<AuthStatus> {
        this.generation++
        this.replace({ ...this.status, [wireKeyOf(provider)]: false })
        return this.api.logout(provider).then(result => {
            if (!result.ok) {
                console.warn(`[auth] Logout from ${wireKeyOf(provider)} failed:`, result.error.message)
            }
            return this.refresh()
        })
    }

    isAuthenticated(provider: Provider): boolean {
        return this.status[wireKeyOf(provider)] === true
    }

    bothAuthenticated(session: Session): boolean {
        return this.isAuthenticated(activeSource(session)) && this.isAuthenticated(activeDestination(session))
    }
}
