import type { FetchFailure, Provider, Result } from '@/types'
import { wireKeyOf } from './providers'

// Backend HTTP surface. Nothing here throws: every call resolves to a Result.

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface BackendClientOptions {
    baseUrl?: string
    fetchImpl?: FetchLike
}

function failure(kind: FetchFailure['kind'], message: string): { ok: false, error: FetchFailure } {
    return { ok: false, error: { kind, message } }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error'
}

export class BackendClient {
    private readonly baseUrl: string
    private readonly fetchImpl: FetchLike

    constructor(options: BackendClientOptions = {}) {
        this.baseUrl = options.baseUrl ?? ''
        this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
    }

    private async send(path: string, init: RequestInit): Promise<Result<Response>> {
        let response: Response
        try {
            response = await this.fetchImpl(`${this.baseUrl}${path}`, {
                credentials: 'same-origin',
                ...init
            })
        } catch (error) {
            return failure('transport', `${path}: ${describe(error)}`)
        }

        if (!response.ok) {
            return failure('status', `${path}: HTTP ${response.status}`)
        }
        return { ok: true, value: response }
    }

    private async getJson(path: string): Promise<Result<unknown>> {
        const sent = await this.send(path, { method: 'GET' })
        if (!sent.ok) return sent

        let text: string
        try {
            text = await sent.value.text()
        } catch (error) {
            return failure('transport', `${path}: ${describe(error)}`)
        }

        try {
            return { ok: true, value: JSON.parse(text) }
        } catch (error) {
            return failure('decode', `${path}: ${describe(error)}`)
        }
    }

    private async post(path: string, body?: unknown): Promise<Result<void>> {
        const init: RequestInit = body === undefined
            ? { method: 'POST' }
            : {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(body)
            }

        const sent = await this.send(path, init)
        if (!sent.ok) return sent
        return { ok: true, value: undefined }
    }

    loginStatus(): Promise<Result<unknown>> {
        return this.getJson('/api/login/status')
    }

    logoutAll(): Promise<Result<void>> {
        return this.post('/api/logout_all')
    }

    logout(provider: Provider): Promise<Result<void>> {
        return this.post(`/api/logout/${wireKeyOf(provider)}`)
    }

    playlists(provider: Provider): Promise<Result<unknown>> {
        return this.getJson(`/api/${wireKeyOf(provider)}/playlists`)
    }

    registerAppleUserToken(token: string): Promise<Result<void>> {
        return this.post('/api/apple/usertoken', { token })
    }

    transfer(destination: Provider, playlist: unknown): Promise<Result<void>> {
        return this.post(`/api/transfer/to/${wireKeyOf(destination)}`, { playlist })
    }
}

export const backend = new BackendClient()
