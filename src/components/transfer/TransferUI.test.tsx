// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { cleanup, screen } from '@testing-library/react'
import { json } from '@/test/fakeFetch'
import { createTestController, renderWithController } from '@/test/renderWithController'
import TransferUI from './TransferUI'

const playlists = [
    { id: 'a1', name: 'Morning', cover: '', track_count: 3, tracks: [] },
    { id: 'a2', name: 'Evening', cover: '', track_count: 5, tracks: [] }
]

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(cleanup)

async function submitTo(destination: string) {
    const test = createTestController({
        routes: {
            'GET /api/login/status': () => json({ apple: true, [destination]: true }),
            'GET /api/apple/playlists': () => json(playlists),
            [`POST /api/transfer/to/${destination}`]: () => json({})
        }
    })
    await test.controller.applyLocation('/list', `left=apple&right=${destination}&li=0`)
    test.controller.toggleAll(true)
    await test.controller.submit().allSettled
    renderWithController(test.controller, <TransferUI stage="DONE" />)
    return test
}

describe('TransferUI done view', () => {
    it('confirms playlists sent to the destination', async () => {
        await submitTo('spotify')

        expect(screen.getByText('Transfer started!')).toBeTruthy()
        expect(screen.getByText('2 playlists are on their way to Spotify.')).toBeTruthy()
    })

    it('does not claim anything was sent to a provider without transfers', async () => {
        const { requests } = await submitTo('amazon')

        expect(screen.getByText('Nothing was sent: Amazon Music does not accept transfers.')).toBeTruthy()
        expect(requests.some(r => r.method === 'POST')).toBe(false)
    })
})
