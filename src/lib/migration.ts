import type {
    AppleLoginPhase,
    AuthStatus,
    PlaylistCollections,
    PlaylistItem,
    Provider,
    Session,
    Stage,
    TransferBatch
} from '@/types'
import type { BackendClient } from './api'
import { AppleTokenHandshake, type NativeBridge } from './apple'
import { AuthGate } from './auth'
import type { AppConfig } from './config'
import { loginUrl } from './oauth'
import { PlaylistStore } from './playlists'
import { hrefFor, stageOf } from './routes'
import {
    activeDestination,
    activeSource,
    decodeSession,
    defaultSession,
    next,
    previous,
    swap
} from './session'
import { dispatchTransfer, selectedItems, toggleAll, toggleOne } from './transfer'

export interface MigrationState {
    stage: Stage
    session: Session
    auth: AuthStatus
    playlists: PlaylistCollections
    loading: boolean
    // Last playlist failure, kept for diagnostics only
    lastError: string | null
    applePhase: AppleLoginPhase
    lastTransfer: TransferBatch | null
}

export interface MigrationDeps {
    api: BackendClient
    config: AppConfig
    bridge?: NativeBridge | null
    // Pushes a new address; the router reports it back through applyLocation
    navigate?: (href: string) => void
}

type Listener = () => void

/**
 * The migration session: which provider pair is in play, who is logged in,
 * what is loaded and selected, and the transfer fan-out.
 *
 * The address bar owns the session. Every navigation event is applied with
 * `applyLocation`, which rebuilds the session from the URL instead of patching it.
 */
export class MigrationController {
    private state: MigrationState
    private readonly listeners = new Set<Listener>()
    private readonly api: BackendClient
    private readonly config: AppConfig
    private readonly bridge: NativeBridge | null
    private readonly navigateTo: (href: string) => void

    readonly auth: AuthGate
    readonly playlists: PlaylistStore
    readonly apple: AppleTokenHandshake | null

    constructor(deps: MigrationDeps) {
        this.api = deps.api
        this.config = deps.config
        this.bridge = deps.bridge ?? null
        this.navigateTo = deps.navigate ?? (() => {})

        this.auth = new AuthGate(this.api, auth => this.setState({ auth }))
        this.playlists = new PlaylistStore(this.api, () => this.setState({
            playlists: this.playlists.getCollections(),
            loading: this.playlists.isLoading(),
            lastError: this.playlists.getLastError()
        }))
        this.apple = this.bridge
            ? new AppleTokenHandshake(this.bridge, this.api, this.auth, {
                retryMs: this.config.appleRetryMs,
                onPhaseChange: applePhase => this.setState({ applePhase })
            })
            : null

        this.state = {
            stage: 'HOME',
            session: defaultSession(),
            auth: {},
            playlists: this.playlists.getCollections(),
            loading: false,
            lastError: null,
            applePhase: 'IDLE',
            lastTransfer: null
        }
    }

    subscribe = (listener: Listener): (() => void) => {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    getSnapshot = (): MigrationState => this.state

    private setState(patch: Partial<MigrationState>): void {
        this.state = { ...this.state, ...patch }
        this.listeners.forEach(listener => listener())
    }

    start(): void {
        this.apple?.attach()
    }

    stop(): void {
        this.apple?.detach()
    }

    // Navigation events

    /**
     * Applies a navigation event: rebuilds the session from the query string, refreshes
     * the login status and, on the list page, loads the active source's playlists.
     * Resolves once every request it started has settled.
     */
    async applyLocation(pathname: string, search: string | URLSearchParams): Promise<void> {
        const stage = stageOf(pathname)
        const session = decodeSession(search)
        this.setState({ stage, session })

        const work: Promise<unknown>[] = [this.auth.refresh()]
        if (stage === 'LIST') {
            const provider = activeSource(session)
            work.push(this.playlists.load(provider, () =>
                this.state.stage === 'LIST' && activeSource(this.state.session) === provider
            ))
        }
        await Promise.all(work)
    }

    private go(stage: Stage, session: Session): void {
        const href = hrefFor(stage, session)
        console.log(`[session] Navigating to ${href}`)
        this.navigateTo(href)
    }

    previous(): void {
        this.go(this.state.stage, previous(this.state.session))
    }

    next(): void {
        this.go(this.state.stage, next(this.state.session))
    }

    swap(): void {
        this.go(this.state.stage, swap(this.state.session))
    }

    home(): void {
        this.go('HOME', this.state.session)
    }

    // Authentication

    activeSource(): Provider {
        return activeSource(this.state.session)
    }

    activeDestination(): Provider {
        return activeDestination(this.state.session)
    }

    canProceed(): boolean {
        return this.auth.bothAuthenticated(this.state.session)
    }

    // Home -> List, only once both sides are logged in
    proceed(): boolean {
        if (!this.canProceed()) return false
        this.go('LIST', this.state.session)
        return true
    }

    loginHref(provider: Provider): string | null {
        return loginUrl(provider, this.state.session, this.config)
    }

    // Apple logs in through the native app when there is one
    usesNativeAppleLogin(): boolean {
        return this.apple !== null && this.bridge !== null && this.bridge.isAvailable()
    }

    loginApple(): void {
        if (!this.apple) {
            console.warn('[apple] No native bridge, cannot start native login')
            return
        }
        this.apple.login()
    }

    logoutAll(): Promise<AuthStatus> {
        this.apple?.reset()
        return this.auth.logoutAll()
    }

    logout(provider: Provider): Promise<AuthStatus> {
        if (provider === 'APPLE') this.apple?.reset()
        return this.auth.logout(provider)
    }

    // Selection, scoped to the active source's collection

    private activeItems(): PlaylistItem[] {
        return this.playlists.get(this.activeSource())
    }

    toggleAll(active: boolean): void {
        const items = this.activeItems()
        const updated = toggleAll(items, active)
        if (updated !== items) this.playlists.replace(this.activeSource(), updated)
    }

    toggleOne(id: string, active: boolean): void {
        const items = this.activeItems()
        const updated = toggleOne(items, id, active)
        if (updated !== items) this.playlists.replace(this.activeSource(), updated)
    }

    selectedItems(): PlaylistItem[] {
        return selectedItems(this.activeItems())
    }

    // Transfer

    /**
     * Fires one transfer per selected playlist at the active destination and moves
     * to Done straight away. Responses are never waited on here.
     */
    submit(): TransferBatch {
        const batch = dispatchTransfer(this.api, this.activeDestination(), this.selectedItems(), {
            concurrency: this.config.transferConcurrency
        })
        this.setState({ stage: 'DONE', lastTransfer: batch })
        this.go('DONE', this.state.session)
        return batch
    }
}
