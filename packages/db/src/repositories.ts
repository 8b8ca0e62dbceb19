import type {
    Conversation,
    InteractionEvent,
    MemoryEntry,
    Message,
    MessageRole,
    RetrievedChunk,
    RollingSummary,
} from '@groundwork/shared'

// Every repository method rejects with StoreUnavailableError when its backend
// cannot be reached or answers with an error.

export interface ConversationRepository {
    /** Creates the conversation on first use; returns the stored row either way. */
    ensure(input: { id: string; tenantId: string; userId?: string | null }): Promise<Conversation>
    find(id: string): Promise<Conversation | null>
}

export interface MessageRepository {
    /** Persists a message and assigns the next order key. */
    insert(input: { conversationId: string; role: MessageRole; content: string }): Promise<Message>
    /** Newest first. */
    latest(conversationId: string, limit: number): Promise<Message[]>
    /** Messages with seq strictly above `afterSeq`, oldest first. */
    after(conversationId: string, afterSeq: number, limit: number): Promise<Message[]>
}

export interface MemoryKvRepository {
    upsert(entry: MemoryEntry): Promise<void>
    /** Returns the stored row as is, expired or not. */
    find(conversationId: string, key: string): Promise<MemoryEntry | null>
    remove(conversationId: string, key: string): Promise<void>
    /** Deletes every entry whose expiry is at or before `now`; returns how many. */
    removeExpired(now: Date): Promise<number>
}

export interface SummaryRepository {
    find(conversationId: string): Promise<RollingSummary | null>
    /** Keeps the stored watermark when `lastMessageSeq` is omitted. */
    upsert(conversationId: string, text: string, lastMessageSeq?: number): Promise<RollingSummary>
}

export type ChunkMatch = Omit<RetrievedChunk, 'rank'>

export interface ChunkMatchQuery {
    tenantId: string
    embedding: number[]
    k: number
    docIds?: string[]
    tags?: string[]
}

export interface ChunkRepository {
    match(query: ChunkMatchQuery): Promise<ChunkMatch[]>
}

export interface InteractionRepository {
    insert(event: InteractionEvent): Promise<void>
    recent(tenantId: string, limit: number): Promise<InteractionEvent[]>
}

export interface Repositories {
    conversations: ConversationRepository
    messages: MessageRepository
    memoryKv: MemoryKvRepository
    summaries: SummaryRepository
    chunks: ChunkRepository
    interactions: InteractionRepository
}
