import { describe, expect, it } from 'vitest'
import { hrefFor, pathOf, stageOf } from './routes'
import { defaultSession, swap } from './session'

describe('stageOf', () => {
    it('maps the three pages', () => {
        expect(stageOf('/')).toBe('HOME')
        expect(stageOf('/list')).toBe('LIST')
        expect(stageOf('/done')).toBe('DONE')
    })

    it('ignores a trailing slash', () => {
        expect(stageOf('/list/')).toBe('LIST')
        expect(stageOf('done')).toBe('DONE')
    })

    it('renders Home for anything else', () => {
        expect(stageOf('')).toBe('HOME')
        expect(stageOf('/callback')).toBe('HOME')
        expect(stageOf('/list/extra')).toBe('HOME')
    })
})

describe('hrefFor', () => {
    it('puts the encoded session on the stage path', () => {
        expect(hrefFor('LIST', defaultSession())).toBe('/list?left=youtube,apple,amazon&right=spotify&li=1')
        expect(hrefFor('HOME', swap(defaultSession()))).toBe('/?left=youtube,spotify,amazon&right=apple&li=1')
    })

    it('agrees with stageOf', () => {
        for (const stage of ['HOME', 'LIST', 'DONE'] as const) {
            expect(stageOf(pathOf(stage))).toBe(stage)
        }
    })
})
