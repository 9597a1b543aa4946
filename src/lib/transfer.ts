import type { PlaylistItem, Provider, TransferBatch, TransferOutcome } from '@/types'
import type { BackendClient } from './api'
import { isPlaylistProvider, wireKeyOf } from './providers'
import { type PlaylistWire, toWire } from './playlists'

// Selection helpers. They always return a new array when anything changed.

export function toggleAll(items: PlaylistItem[], active: boolean): PlaylistItem[] {
    return items.map(item => item.selected === active ? item : { ...item, selected: active })
}

export function toggleOne(items: PlaylistItem[], id: string, active: boolean): PlaylistItem[] {
    if (!items.some(item => item.id === id && item.selected !== active)) {
        return items
    }
    return items.map(item => item.id === id ? { ...item, selected: active } : item)
}

export function selectedItems(items: PlaylistItem[]): PlaylistItem[] {
    return items.filter(item => item.selected)
}

export interface DispatchOptions {
    // Max requests in flight; null or undefined issues every request at once
    concurrency?: number | null
}

// Starts at most `limit` workers at a time, in input order
function runBounded<T, R>(inputs: T[], limit: number, worker: (input: T) => Promise<R>): Promise<R>[] {
    let active = 0
    const waiting: Array<() => void> = []

    const release = () => {
        active--
        const start = waiting.shift()
        if (start) start()
    }

    return inputs.map(input => new Promise<R>((resolve, reject) => {
        const start = () => {
            active++
            worker(input).then(resolve, reject).finally(release)
        }
        if (active < limit) {
            start()
        } else {
            waiting.push(start)
        }
    }))
}

/**
 * Sends one transfer request per item to the destination's endpoint. Payloads are
 * serialized before this returns, so later selection changes never reach a request.
 * Nobody has to await the returned outcomes; they exist for diagnostics.
 */
export function dispatchTransfer(
    api: BackendClient,
    destination: Provider,
    items: PlaylistItem[],
    options: DispatchOptions = {}
): TransferBatch {
    const snapshot = [...items]
    const payloads: PlaylistWire[] = snapshot.map(toWire)

    const send = async (payload: PlaylistWire): Promise<TransferOutcome> => {
        if (!isPlaylistProvider(destination)) {
            return {
                id: payload.id,
                ok: false,
                error: { kind: 'unsupported', message: `${wireKeyOf(destination)} has no transfer endpoint` }
            }
        }
        const result = await api.transfer(destination, payload)
        return result.ok
            ? { id: payload.id, ok: true }
            : { id: payload.id, ok: false, error: result.error }
    }

    const limit = options.concurrency ?? null
    const outcomes = limit !== null && limit > 0 && limit < payloads.length
        ? runBounded(payloads, limit, send)
        : payloads.map(send)

    const allSettled = Promise.all(outcomes).then(results => {
        const failed = results.filter(outcome => !outcome.ok)
        if (failed.length > 0) {
            console.warn(`[transfer] ${failed.length}/${results.length} transfers to ${wireKeyOf(destination)} failed:`,
                failed.map(outcome => outcome.id).join(', '))
        } else {
            console.log(`[transfer] ${results.length} transfers to ${wireKeyOf(destination)} completed`)
        }
        return results
    })

    console.log(`[transfer] Dispatched ${snapshot.length} playlists to ${wireKeyOf(destination)}`)
    return { destination, items: snapshot, outcomes, allSettled }
}
