import type { MemoryKvRepository, SummaryRepository } from '@groundwork/db'
import { StoreUnavailableError, errorMessage } from '@groundwork/shared'
import type { JsonValue, Lookup, RollingSummary } from '@groundwork/shared'

export interface MemoryStoreOptions {
    kv: MemoryKvRepository
    summaries: SummaryRepository
    now?: () => Date
}

/**
 * Short-lived key/value entries with optional TTL, plus the single rolling
 * summary kept per conversation.
 *
 * Expiry is enforced on read: an entry past its expiry reads as absent even
 * when the sweep has not removed it yet.
 */
export class MemoryStore {
    private readonly kv: MemoryKvRepository
    private readonly summaries: SummaryRepository
    private readonly now: () => Date

    constructor(options: MemoryStoreOptions) {
        this.kv = options.kv
        this.summaries = options.summaries
        this.now = options.now ?? (() => new Date())
    }

    // ── KEY / VALUE ───────────────────────────────────────────────────────────

    async set(conversationId: string, key: string, value: JsonValue, ttlSeconds?: number): Promise<void> {
        const expiresAt = ttlSeconds !== undefined && ttlSeconds > 0
            ? new Date(this.now().getTime() + ttlSeconds * 1000)
            : null
        await this.kv.upsert({ conversationId, key, value, expiresAt })
    }

    async get(conversationId: string, key: string): Promise<Lookup<JsonValue>> {
        const entry = await this.kv.find(conversationId, key)
        if (!entry) return { found: false }
        if (entry.expiresAt && entry.expiresAt.getTime() <= this.now().getTime()) return { found: false }
        return { found: true, value: entry.value }
    }

    async delete(conversationId: string, key: string): Promise<void> {
        await this.kv.remove(conversationId, key)
    }

    /** Purges every entry whose expiry is at or before `now`. Idempotent. */
    async sweepExpired(now: Date = this.now()): Promise<number> {
        return this.kv.removeExpired(now)
    }

    // ── ROLLING SUMMARY ───────────────────────────────────────────────────────

    async getSummary(conversationId: string): Promise<Lookup<string>> {
        const summary = await this.summaries.find(conversationId)
        if (!summary || summary.text.trim() === '') return { found: false }
        return { found: true, value: summary.text }
    }

    /** Replaces the summary; last writer wins. */
    async upsertSummary(conversationId: string, text: string, lastMessageSeq?: number): Promise<RollingSummary> {
        return this.summaries.upsert(conversationId, text, lastMessageSeq)
    }

    async findSummaryRecord(conversationId: string): Promise<RollingSummary | null> {
        return this.summaries.find(conversationId)
    }

    /**
     * The summary as the request path consumes it: missing and unreachable
     * both read as ''.
     */
    async summaryOrEmpty(conversationId: string): Promise<string> {
        try {
            const summary = await this.getSummary(conversationId)
            return summary.found ? summary.value : ''
        } catch (err) {
            if (!(err instanceof StoreUnavailableError)) throw err
            console.warn(`[memory] summary unavailable for ${conversationId}, continuing without it:`, errorMessage(err))
            return ''
        }
    }
}
