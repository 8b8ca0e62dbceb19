import OpenAI from 'openai'
import { z } from 'zod'
import { EmbeddingUnavailableError } from '@groundwork/shared'
import type { Embedder } from '@groundwork/shared'

// Providers answer with either a bare vector or an object carrying it.
const EmbeddingPayload = z.union([
    z.array(z.number()),
    z.object({ embedding: z.array(z.number()) }).transform(o => o.embedding),
    z.object({ values: z.array(z.number()) }).transform(o => o.values),
])

export function decodeEmbedding(payload: unknown): number[] {
    const parsed = EmbeddingPayload.safeParse(payload)
    if (!parsed.success || parsed.data.length === 0) {
        throw new Error('Unsupported embedding payload')
    }
    return parsed.data
}

export interface OpenAIEmbedderOptions {
    baseURL: string
    apiKey: string | undefined
    model: string
    cacheSize?: number
}

export class OpenAIEmbedder implements Embedder {
    private readonly client: OpenAI
    private readonly model: string
    private readonly cacheSize: number
    // Identical strings embed once per process lifetime (bounded, oldest evicted)
    private readonly cache = new Map<string, number[]>()

    constructor(options: OpenAIEmbedderOptions, client?: OpenAI) {
        this.client = client ?? new OpenAI({ baseURL: options.baseURL, apiKey: options.apiKey ?? 'not-set' })
        this.model = options.model
        this.cacheSize = options.cacheSize ?? 500
    }

    async embed(text: string): Promise<number[]> {
        const input = text.replace(/\n/g, ' ').slice(0, 8000)   // max safe input
        const cached = this.cache.get(input)
        if (cached) return cached

        let vector: number[]
        try {
            const response = await this.client.embeddings.create({ model: this.model, input })
            vector = decodeEmbedding(response.data[0])
        } catch (err) {
            console.error('[embeddings] provider call failed:', err instanceof Error ? err.message : err)
            throw new EmbeddingUnavailableError(err)
        }

        if (this.cache.size >= this.cacheSize) {
            const oldest = this.cache.keys().next()
            if (!oldest.done) this.cache.delete(oldest.value)
        }
        this.cache.set(input, vector)
        return vector
    }
}
