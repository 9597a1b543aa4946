import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { PlaylistItem } from '@/types'
import { createFakeFetch, deferred, json } from '@/test/fakeFetch'
import { BackendClient } from './api'
import { PlaylistStore, collectionOf, emptyCollections, fetchPlaylists, normalizePlaylists, toWire } from './playlists'

const roadTrip = {
    id: 'pl-1',
    name: 'Road Trip',
    cover: 'https://img.test/1.jpg',
    track_count: 2,
    tracks: [
        { title: 'First Song', artist: 'Band A', isrc: 'TEST00000001' },
        { title: 'Second Song', artist: 'Band B', isrc: null }
    ]
}

const quiet = {
    id: 'pl-2',
    name: 'Quiet',
    cover: '',
    track_count: 0,
    tracks: []
}

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
})

describe('normalizePlaylists', () => {
    it('maps wire records to unselected items', () => {
        expect(normalizePlaylists([roadTrip])).toEqual({
            ok: true,
            value: [{
                id: 'pl-1',
                name: 'Road Trip',
                coverUrl: 'https://img.test/1.jpg',
                trackCount: 2,
                selected: false,
                tracks: [
                    { title: 'First Song', artist: 'Band A', isrc: 'TEST00000001' },
                    { title: 'Second Song', artist: 'Band B' }
                ]
            }]
        })
    })

    it('rejects the whole list when one record is malformed', () => {
        expect(normalizePlaylists([roadTrip, { ...quiet, id: 7 }])).toEqual({
            ok: false,
            error: { kind: 'decode', message: '1.id: Expected string, received number' }
        })
    })

    it('rejects a body that is not a list', () => {
        const result = normalizePlaylists({ items: [] })
        expect(result.ok).toBe(false)
        if (!result.ok) expect(result.error.kind).toBe('decode')
    })

    it('writes items back in wire form', () => {
        const result = normalizePlaylists([roadTrip])
        if (!result.ok) throw new Error(result.error.message)
        expect(toWire(result.value[0])).toEqual(roadTrip)
    })
})

describe('fetchPlaylists', () => {
    it('never calls the backend for Amazon', async () => {
        const { fetchImpl, requests } = createFakeFetch()

        const result = await fetchPlaylists(new BackendClient({ fetchImpl }), 'AMAZON')

        expect(result).toEqual({ ok: false, error: { kind: 'unsupported', message: 'amazon has no playlist endpoint' } })
        expect(requests).toEqual([])
    })
})

describe('collectionOf', () => {
    it('has nothing for Amazon', () => {
        expect(collectionOf(emptyCollections(), 'AMAZON')).toEqual([])
    })
})

describe('PlaylistStore', () => {
    it('loads a provider collection without touching the others', async () => {
        const { fetchImpl } = createFakeFetch({
            'GET /api/youtube/playlists': () => json([roadTrip, quiet])
        })
        const store = new PlaylistStore(new BackendClient({ fetchImpl }))

        const loading = store.load('YOUTUBE')
        expect(store.isLoading()).toBe(true)
        await loading

        expect(store.isLoading()).toBe(false)
        expect(store.get('YOUTUBE').map(item => item.id)).toEqual(['pl-1', 'pl-2'])
        expect(store.get('SPOTIFY')).toEqual([])
        expect(store.getLastError()).toBeNull()
    })

    it('commits an empty list and keeps the error when loading fails', async () => {
        const { fetchImpl } = createFakeFetch({
            'GET /api/apple/playlists': () => json({ error: 'down' }, 500)
        })
        const store = new PlaylistStore(new BackendClient({ fetchImpl }))
        store.replace('APPLE', [{ id: 'old', name: 'Old', coverUrl: '', trackCount: 0, selected: true, tracks: [] }])

        await store.load('APPLE')

        expect(store.get('APPLE')).toEqual([])
        expect(store.getLastError()).toBe('status: /api/apple/playlists: HTTP 500')
        expect(store.isLoading()).toBe(false)
    })

    it('commits an empty list for an undecodable body', async () => {
        const { fetchImpl } = createFakeFetch({
            'GET /api/spotify/playlists': () => json([{ id: 'x' }])
        })
        const store = new PlaylistStore(new BackendClient({ fetchImpl }))

        await store.load('SPOTIFY')

        expect(store.get('SPOTIFY')).toEqual([])
        expect(store.getLastError()?.startsWith('decode: ')).toBe(true)
    })

    it('keeps the newest of two overlapping loads', async () => {
        const slow = deferred<Response>()
        let calls = 0
        const { fetchImpl } = createFakeFetch({
            'GET /api/spotify/playlists': () => ++calls === 1 ? slow.promise : json([quiet])
        })
        const store = new PlaylistStore(new BackendClient({ fetchImpl }))

        const first = store.load('SPOTIFY')
        await store.load('SPOTIFY')
        slow.resolve(json([roadTrip]))
        await first

        expect(store.get('SPOTIFY').map(item => item.id)).toEqual(['pl-2'])
    })

    it('drops a result that is no longer wanted', async () => {
        const { fetchImpl } = createFakeFetch({
            'GET /api/apple/playlists': () => json([roadTrip])
        })
        const onChange = vi.fn()
        const store = new PlaylistStore(new BackendClient({ fetchImpl }), onChange)

        await store.load('APPLE', () => false)

        expect(store.get('APPLE')).toEqual([])
        expect(store.isLoading()).toBe(false)
        expect(onChange).toHaveBeenCalledTimes(2)
    })

    it('replaces a collection in place of the old one', () => {
        const store = new PlaylistStore(new BackendClient({ fetchImpl: createFakeFetch().fetchImpl }))
        const before = store.getCollections()
        const items: PlaylistItem[] = [{ id: 'a', name: 'A', coverUrl: '', trackCount: 1, selected: true, tracks: [] }]

        store.replace('YOUTUBE', items)

        expect(store.getCollections()).not.toBe(before)
        expect(store.get('YOUTUBE')).toBe(items)
        expect(before.YOUTUBE).toEqual([])
    })
})
