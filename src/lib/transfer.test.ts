import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { PlaylistItem } from '@/types'
import { createFakeFetch, deferred, flush, json } from '@/test/fakeFetch'
import { BackendClient } from './api'
import { dispatchTransfer, selectedItems, toggleAll, toggleOne } from './transfer'

function item(id: string, selected = false): PlaylistItem {
    return {
        id,
        name: `Playlist ${id}`,
        coverUrl: '',
        trackCount: 1,
        selected,
        tracks: [{ title: `Song ${id}`, artist: 'Artist' }]
    }
}

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
})

describe('selection', () => {
    it('selects and clears everything', () => {
        const items = [item('a'), item('b', true)]
        expect(selectedItems(toggleAll(items, true)).map(i => i.id)).toEqual(['a', 'b'])
        expect(selectedItems(toggleAll(items, false))).toEqual([])
        expect(items[0].selected).toBe(false)
    })

    it('toggles a single playlist by id', () => {
        const items = [item('a'), item('b')]
        const updated = toggleOne(items, 'b', true)
        expect(selectedItems(updated).map(i => i.id)).toEqual(['b'])
        expect(updated[0]).toBe(items[0])
    })

    it('returns the same array when nothing changes', () => {
        const items = [item('a', true)]
        expect(toggleOne(items, 'a', true)).toBe(items)
        expect(toggleOne(items, 'missing', false)).toBe(items)
    })
})

describe('dispatchTransfer', () => {
    it('sends one request per playlist with the wire payload', async () => {
        const { fetchImpl, requests } = createFakeFetch({
            'POST /api/transfer/to/spotify': () => json({})
        })
        const batch = dispatchTransfer(new BackendClient({ fetchImpl }), 'SPOTIFY', [item('a'), item('b')])

        expect(requests.map(r => r.body)).toEqual([
            { playlist: { id: 'a', name: 'Playlist a', cover: '', track_count: 1, tracks: [{ title: 'Song a', artist: 'Artist', isrc: null }] } },
            { playlist: { id: 'b', name: 'Playlist b', cover: '', track_count: 1, tracks: [{ title: 'Song b', artist: 'Artist', isrc: null }] } }
        ])
        expect(await batch.allSettled).toEqual([{ id: 'a', ok: true }, { id: 'b', ok: true }])
    })

    it('sends what was selected at dispatch time', async () => {
        const { fetchImpl, requests } = createFakeFetch({
            'POST /api/transfer/to/youtube': () => json({})
        })
        const items = [item('a')]
        const batch = dispatchTransfer(new BackendClient({ fetchImpl }), 'YOUTUBE', items, { concurrency: 1 })
        items[0].name = 'Renamed'
        items.push(item('late'))

        await batch.allSettled

        expect(batch.items.map(i => i.id)).toEqual(['a'])
        expect(requests).toHaveLength(1)
        expect(requests[0].body).toMatchObject({ playlist: { name: 'Playlist a' } })
    })

    it('reports failures per playlist without stopping the rest', async () => {
        const { fetchImpl } = createFakeFetch({
            'POST /api/transfer/to/apple': request =>
                json({}, JSON.stringify(request.body).includes('"id":"b"') ? 502 : 200)
        })
        const batch = dispatchTransfer(new BackendClient({ fetchImpl }), 'APPLE', [item('a'), item('b'), item('c')])

        expect(await batch.allSettled).toEqual([
            { id: 'a', ok: true },
            { id: 'b', ok: false, error: { kind: 'status', message: '/api/transfer/to/apple: HTTP 502' } },
            { id: 'c', ok: true }
        ])
    })

    it('never calls the backend for Amazon', async () => {
        const { fetchImpl, requests } = createFakeFetch()
        const batch = dispatchTransfer(new BackendClient({ fetchImpl }), 'AMAZON', [item('a')])

        expect(await batch.allSettled).toEqual([{
            id: 'a',
            ok: false,
            error: { kind: 'unsupported', message: 'amazon has no transfer endpoint' }
        }])
        expect(requests).toEqual([])
    })

    it('limits requests in flight when a concurrency is set', async () => {
        const answers = [deferred<Response>(), deferred<Response>(), deferred<Response>()]
        let calls = 0
        const { fetchImpl, requests } = createFakeFetch({
            'POST /api/transfer/to/spotify': () => answers[calls++].promise
        })
        const batch = dispatchTransfer(new BackendClient({ fetchImpl }), 'SPOTIFY', [item('a'), item('b'), item('c')], {
            concurrency: 2
        })

        expect(requests).toHaveLength(2)
        answers[0].resolve(json({}))
        await flush()
        expect(requests).toHaveLength(3)

        answers[1].resolve(json({}))
        answers[2].resolve(json({}))
        expect((await batch.allSettled).map(outcome => outcome.ok)).toEqual([true, true, true])
    })

    it('issues everything at once by default', () => {
        const { fetchImpl, requests } = createFakeFetch({
            'POST /api/transfer/to/spotify': () => deferred<Response>().promise
        })
        dispatchTransfer(new BackendClient({ fetchImpl }), 'SPOTIFY', [item('a'), item('b'), item('c')])

        expect(requests).toHaveLength(3)
    })
})
