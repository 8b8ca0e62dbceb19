import { randomUUID } from 'node:crypto'
import type {
    Conversation,
    InteractionEvent,
    MemoryEntry,
    Message,
    RollingSummary,
} from '@groundwork/shared'
import type {
    ChunkMatch,
    ChunkRepository,
    ConversationRepository,
    InteractionRepository,
    MemoryKvRepository,
    MessageRepository,
    Repositories,
    SummaryRepository,
} from './repositories'

// Process-local stand-ins for the Supabase and Redis repositories, used when
// STORAGE_DRIVER=memory and by the test suites. Nothing survives a restart.

export class InMemoryConversations implements ConversationRepository {
    readonly rows = new Map<string, Conversation>()

    async ensure({ id, tenantId, userId = null }: { id: string; tenantId: string; userId?: string | null }) {
        const existing = this.rows.get(id)
        if (existing) return existing
        const created: Conversation = { id, tenantId, userId, status: 'active' }
        this.rows.set(id, created)
        return created
    }

    async find(id: string) {
        return this.rows.get(id) ?? null
    }
}

export class InMemoryMessages implements MessageRepository {
    readonly rows: Message[] = []
    private seq = 0

    async insert({ conversationId, role, content }: Pick<Message, 'conversationId' | 'role' | 'content'>) {
        const message: Message = {
            id: randomUUID(),
            conversationId,
            role,
            content,
            seq: ++this.seq,
            createdAt: new Date(),
        }
        this.rows.push(message)
        return message
    }

    async latest(conversationId: string, limit: number) {
        return this.rows
            .filter(m => m.conversationId === conversationId)
            .sort((a, b) => b.seq - a.seq)
            .slice(0, limit)
    }

    async after(conversationId: string, afterSeq: number, limit: number) {
        return this.rows
            .filter(m => m.conversationId === conversationId && m.seq > afterSeq)
            .sort((a, b) => a.seq - b.seq)
            .slice(0, limit)
    }
}

export class InMemoryMemoryKv implements MemoryKvRepository {
    readonly rows = new Map<string, MemoryEntry>()

    private static id(conversationId: string, key: string): string {
        return JSON.stringify([conversationId, key])
    }

    async upsert(entry: MemoryEntry) {
        this.rows.set(InMemoryMemoryKv.id(entry.conversationId, entry.key), { ...entry })
    }

    async find(conversationId: string, key: string) {
        return this.rows.get(InMemoryMemoryKv.id(conversationId, key)) ?? null
    }

    async remove(conversationId: string, key: string) {
        this.rows.delete(InMemoryMemoryKv.id(conversationId, key))
    }

    async removeExpired(now: Date) {
        let removed = 0
        for (const [id, entry] of this.rows) {
            if (entry.expiresAt && entry.expiresAt.getTime() <= now.getTime()) {
                this.rows.delete(id)
                removed++
            }
        }
        return removed
    }
}

export class InMemorySummaries implements SummaryRepository {
    readonly rows = new Map<string, RollingSummary>()

    async find(conversationId: string) {
        return this.rows.get(conversationId) ?? null
    }

    async upsert(conversationId: string, text: string, lastMessageSeq?: number) {
        const summary: RollingSummary = {
            conversationId,
            text,
            lastMessageSeq: lastMessageSeq ?? this.rows.get(conversationId)?.lastMessageSeq ?? 0,
            updatedAt: new Date(),
        }
        this.rows.set(conversationId, summary)
        return summary
    }
}

export interface StoredChunk extends Omit<ChunkMatch, 'distance'> {
    embedding: number[]
    tags?: string[]
}

/** Brute-force cosine distance over a handful of chunks. */
export class InMemoryChunks implements ChunkRepository {
    readonly rows: StoredChunk[] = []

    add(...chunks: StoredChunk[]): this {
        this.rows.push(...chunks)
        return this
    }

    async match({ tenantId, embedding, k, docIds, tags }: Parameters<ChunkRepository['match']>[0]) {
        return this.rows
            .filter(c => c.tenantId === tenantId)
            .filter(c => !docIds?.length || docIds.includes(c.docId))
            .filter(c => !tags?.length || tags.some(t => c.tags?.includes(t)))
            .map(({ embedding: stored, tags: _tags, ...chunk }): ChunkMatch => ({
                ...chunk,
                distance: cosineDistance(embedding, stored),
            }))
            .sort((a, b) => a.distance - b.distance || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0))
            .slice(0, k)
    }
}

export function cosineDistance(a: number[], b: number[]): number {
    let dot = 0
    let normA = 0
    let normB = 0
    for (let i = 0; i < Math.min(a.length, b.length); i++) {
        dot += a[i] * b[i]
        normA += a[i] * a[i]
        normB += b[i] * b[i]
    }
    if (normA === 0 || normB === 0) return 1
    return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

export class InMemoryInteractions implements InteractionRepository {
    readonly rows: InteractionEvent[] = []

    async insert(event: InteractionEvent) {
        this.rows.push(event)
    }

    async recent(tenantId: string, limit: number) {
        return this.rows
            .filter(e => e.tenantId === tenantId)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .slice(0, limit)
    }
}

export interface InMemoryRepositories extends Repositories {
    conversations: InMemoryConversations
    messages: InMemoryMessages
    memoryKv: InMemoryMemoryKv
    summaries: InMemorySummaries
    chunks: InMemoryChunks
    interactions: InMemoryInteractions
}

export function createInMemoryRepositories(): InMemoryRepositories {
    return {
        conversations: new InMemoryConversations(),
        messages: new InMemoryMessages(),
        memoryKv: new InMemoryMemoryKv(),
        summaries: new InMemorySummaries(),
        chunks: new InMemoryChunks(),
        interactions: new InMemoryInteractions(),
    }
}
