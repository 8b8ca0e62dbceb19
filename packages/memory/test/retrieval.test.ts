import { describe, expect, it, vi } from 'vitest'
import { InMemoryChunks } from '@groundwork/db'
import type { ChunkMatch, ChunkRepository } from '@groundwork/db'
import type { Embedder } from '@groundwork/shared'
import { RetrievalEngine } from '../src'

function chunk(chunkId: string, embedding: number[], tenantId = 't1') {
    return { chunkId, docId: `doc-${chunkId}`, title: `Doc ${chunkId}`, uri: null, text: `text ${chunkId}`, tenantId, embedding }
}

const fixedEmbedder = (vector: number[]): Embedder => ({ embed: vi.fn(async () => vector) })

describe('RetrievalEngine.topK', () => {
    it('orders by ascending distance and breaks ties by chunk id', async () => {
        const chunks = new InMemoryChunks().add(chunk('c', [0, 1]), chunk('b', [1, 0]), chunk('a', [1, 0]))
        const engine = new RetrievalEngine(fixedEmbedder([1, 0]), chunks)

        const results = await engine.topK('t1', [1, 0], 3)

        expect(results.map(r => r.chunkId)).toEqual(['a', 'b', 'c'])
        expect(results.map(r => r.rank)).toEqual([1, 2, 3])
        expect(results.map(r => r.distance)).toEqual([0, 0, 1])
    })

    it('is deterministic across repeated calls', async () => {
        const chunks = new InMemoryChunks().add(
            chunk('z', [1, 1]),
            chunk('y', [1, 1]),
            chunk('x', [1, 1]),
            chunk('w', [1, 0])
        )
        const engine = new RetrievalEngine(fixedEmbedder([1, 1]), chunks)

        const first = await engine.topK('t1', [1, 1], 4)
        const second = await engine.topK('t1', [1, 1], 4)

        expect(second).toEqual(first)
        for (let i = 1; i < first.length; i++) {
            expect(first[i].distance).toBeGreaterThanOrEqual(first[i - 1].distance)
        }
    })

    it('re-sorts whatever order the store answers in', async () => {
        const rows: ChunkMatch[] = [
            { chunkId: '2', docId: 'd', title: null, uri: null, text: 'two', tenantId: 't1', distance: 0.5 },
            { chunkId: '1', docId: 'd', title: null, uri: null, text: 'one', tenantId: 't1', distance: 0.5 },
            { chunkId: '0', docId: 'd', title: null, uri: null, text: 'zero', tenantId: 't1', distance: 0.9 },
        ]
        const store: ChunkRepository = { match: async () => rows }
        const engine = new RetrievalEngine(fixedEmbedder([1]), store)

        expect((await engine.topK('t1', [1], 2)).map(r => [r.chunkId, r.rank])).toEqual([['1', 1], ['2', 2]])
    })

    it('returns only the tenant\'s chunks, at most k', async () => {
        const chunks = new InMemoryChunks().add(chunk('a', [1, 0]), chunk('b', [1, 0], 'other'), chunk('c', [0.9, 0.1]))
        const engine = new RetrievalEngine(fixedEmbedder([1, 0]), chunks)

        expect((await engine.topK('t1', [1, 0], 1)).map(r => r.chunkId)).toEqual(['a'])
        expect((await engine.topK('t1', [1, 0], 5)).map(r => r.chunkId)).toEqual(['a', 'c'])
        expect(await engine.topK('t1', [1, 0], 0)).toEqual([])
    })

    it('returns an empty list when the store is down', async () => {
        const store: ChunkRepository = { match: () => Promise.reject(new Error('connection refused')) }
        const engine = new RetrievalEngine(fixedEmbedder([1]), store)

        expect(await engine.topK('t1', [1], 5)).toEqual([])
    })
})

describe('RetrievalEngine.retrieve', () => {
    it('embeds the query and returns ranked chunks', async () => {
        const embedder = fixedEmbedder([1, 0])
        const engine = new RetrievalEngine(embedder, new InMemoryChunks().add(chunk('a', [1, 0])))

        const outcome = await engine.retrieve('t1', 'capital of France', 5)

        expect(embedder.embed).toHaveBeenCalledWith('capital of France')
        expect(outcome.degraded).toBe(false)
        expect(outcome.chunks.map(c => c.chunkId)).toEqual(['a'])
    })

    it('degrades to zero context when embedding fails', async () => {
        const embedder: Embedder = { embed: () => Promise.reject(new Error('quota exceeded')) }
        const engine = new RetrievalEngine(embedder, new InMemoryChunks().add(chunk('a', [1, 0])))

        expect(await engine.retrieve('t1', 'q', 5)).toEqual({ chunks: [], degraded: true, reason: 'embedding_unavailable' })
    })

    it('degrades to zero context when the vector store fails', async () => {
        const store: ChunkRepository = { match: () => Promise.reject(new Error('timeout')) }
        const engine = new RetrievalEngine(fixedEmbedder([1]), store)

        expect(await engine.retrieve('t1', 'q', 5)).toEqual({ chunks: [], degraded: true, reason: 'retrieval_unavailable' })
    })

    it('degrades when the embedder does not answer in time', async () => {
        const embedder: Embedder = { embed: () => new Promise<number[]>(() => {}) }
        const engine = new RetrievalEngine(embedder, new InMemoryChunks().add(chunk('a', [1, 0])), { timeoutMs: 20 })

        expect(await engine.retrieve('t1', 'q', 5)).toEqual({ chunks: [], degraded: true, reason: 'embedding_unavailable' })
    })

    it('degrades when the vector search does not answer in time', async () => {
        const store: ChunkRepository = { match: () => new Promise<ChunkMatch[]>(() => {}) }
        const engine = new RetrievalEngine(fixedEmbedder([1]), store, { timeoutMs: 20 })

        expect(await engine.retrieve('t1', 'q', 5)).toEqual({ chunks: [], degraded: true, reason: 'retrieval_unavailable' })
    })

    it('passes document and tag filters through', async () => {
        const chunks = new InMemoryChunks().add(
            { ...chunk('a', [1, 0]), tags: ['faq'] },
            { ...chunk('b', [1, 0]), tags: ['policy'] }
        )
        const engine = new RetrievalEngine(fixedEmbedder([1, 0]), chunks)

        const outcome = await engine.retrieve('t1', 'q', 5, { tags: ['policy'] })
        expect(outcome.chunks.map(c => c.chunkId)).toEqual(['b'])
    })
})
