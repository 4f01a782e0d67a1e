import { describe, it, expect } from 'vitest'
import { MemoryCorpusStore } from './CorpusStore'

describe('MemoryCorpusStore', () => {
    it('returns null for an unknown key', async () => {
        expect(await new MemoryCorpusStore().lookup('nobody')).toBeNull()
    })

    it('hands out copies, not the stored array', async () => {
        const store = new MemoryCorpusStore()
        const corpus = ['one', 'two']
        await store.store('someone', corpus)
        corpus.push('three')

        const first = await store.lookup('someone')
        first?.push('four')

        expect(await store.lookup('someone')).toEqual(['one', 'two'])
    })
})
