import type { ChunkMatch, ChunkRepository } from '@groundwork/db'
import { EmbeddingUnavailableError, errorMessage, withDeadline } from '@groundwork/shared'
import type { Embedder, RetrievalFilters, RetrievedChunk } from '@groundwork/shared'

export interface RetrievalOutcome {
    chunks: RetrievedChunk[]
    degraded: boolean
    reason?: 'embedding_unavailable' | 'retrieval_unavailable'
}

export interface RetrievalOptions {
    /** Applied to the embedding call and to the vector search separately. */
    timeoutMs?: number
}

const DEFAULT_TIMEOUT_MS = 60_000

// Ascending distance; equal distances fall back to chunk id so a fixed query
// over a fixed store always orders the same way.
export function compareChunks(a: ChunkMatch, b: ChunkMatch): number {
    if (a.distance !== b.distance) return a.distance - b.distance
    if (a.chunkId === b.chunkId) return 0
    return a.chunkId < b.chunkId ? -1 : 1
}

/**
 * Embeds a query and fetches the closest knowledge-base chunks.
 * Retrieval never takes a request down: with the embedder or the store
 * unavailable the caller gets zero context, flagged as degraded.
 */
export class RetrievalEngine {
    private readonly timeoutMs: number

    constructor(
        private readonly embedder: Embedder,
        private readonly chunks: ChunkRepository,
        options: RetrievalOptions = {}
    ) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    }

    /** Rejects with EmbeddingUnavailableError when the provider fails or times out. */
    async embedQuery(text: string): Promise<number[]> {
        try {
            return await withDeadline(this.embedder.embed(text), this.timeoutMs, 'embedding')
        } catch (err) {
            if (err instanceof EmbeddingUnavailableError) throw err
            throw new EmbeddingUnavailableError(err)
        }
    }

    async topK(tenantId: string, vector: number[], k: number, filters: RetrievalFilters = {}): Promise<RetrievedChunk[]> {
        return (await this.search(tenantId, vector, k, filters)) ?? []
    }

    async retrieve(tenantId: string, query: string, k: number, filters: RetrievalFilters = {}): Promise<RetrievalOutcome> {
        let vector: number[]
        try {
            vector = await this.embedQuery(query)
        } catch (err) {
            console.warn('[retrieval] embedding unavailable, answering without context:', errorMessage(err))
            return { chunks: [], degraded: true, reason: 'embedding_unavailable' }
        }

        const chunks = await this.search(tenantId, vector, k, filters)
        if (chunks === null) return { chunks: [], degraded: true, reason: 'retrieval_unavailable' }
        return { chunks, degraded: false }
    }

    // null when the store failed, so retrieve() can tell "down" from "nothing found"
    private async search(
        tenantId: string,
        vector: number[],
        k: number,
        filters: RetrievalFilters
    ): Promise<RetrievedChunk[] | null> {
        if (k <= 0) return []
        let matches: ChunkMatch[]
        try {
            const query = { tenantId, embedding: vector, k, docIds: filters.docIds, tags: filters.tags }
            matches = await withDeadline(this.chunks.match(query), this.timeoutMs, 'vector search')
        } catch (err) {
            console.warn('[retrieval] vector search failed, falling back to zero-context:', errorMessage(err))
            return null
        }

        return [...matches]
            .sort(compareChunks)
            .slice(0, k)
            .map((chunk, i) => ({ ...chunk, rank: i + 1 }))
    }
}
