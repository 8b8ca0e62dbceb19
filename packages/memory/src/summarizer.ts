import { KeyedLock, errorMessage, withDeadline } from '@groundwork/shared'
import type { Generator, Message } from '@groundwork/shared'
import type { MemoryStore } from './memory-store'
import type { MessageLog } from './message-log'
import { NO_SUMMARY } from './context-builder'

const MAX_MESSAGES_PER_UPDATE = 20
const DEFAULT_TIMEOUT_MS = 60_000

const SUMMARY_SYSTEM_PROMPT = `You are a concise summarizer that maintains long-term memory for a conversation.
Summarize NEW_MESSAGES in 5-8 bullet points, preserving entities, tasks, preferences, and any decisions.
If PREVIOUS_SUMMARY exists, update/merge it; do not duplicate. Return only the updated summary text.`

export function buildSummaryPrompt(previousSummary: string | null, newMessages: Message[]): string {
    const lines = newMessages
        .slice(0, MAX_MESSAGES_PER_UPDATE)
        .map(m => `- ${m.role}: ${m.content}`)
    const previous = previousSummary?.trim() ? previousSummary.trim() : NO_SUMMARY
    return `PREVIOUS_SUMMARY:\n${previous}\n\nNEW_MESSAGES:\n${lines.join('\n')}\n\nOUTPUT:`
}

export interface RollingSummarizerOptions {
    memory: MemoryStore
    log: MessageLog
    generator: Generator
    model: string
    /** Share the MessageLog's lock so appends wait for a refresh in progress. */
    lock?: KeyedLock
    timeoutMs?: number
}

/**
 * Folds messages past the summary's watermark into it. Runs after each
 * assistant turn; failures are logged and never reach the chat path.
 */
export class RollingSummarizer {
    private readonly lock: KeyedLock

    constructor(private readonly options: RollingSummarizerOptions) {
        this.lock = options.lock ?? new KeyedLock()
    }

    /** Resolves true when a new summary was written. */
    refresh(conversationId: string): Promise<boolean> {
        return this.lock.run(conversationId, () => this.refreshUnlocked(conversationId))
    }

    private async refreshUnlocked(conversationId: string): Promise<boolean> {
        const { memory, log, generator, model, timeoutMs = DEFAULT_TIMEOUT_MS } = this.options
        try {
            const current = await memory.findSummaryRecord(conversationId)
            const newMessages = await log.since(conversationId, current?.lastMessageSeq ?? 0, MAX_MESSAGES_PER_UPDATE)
            if (newMessages.length === 0) return false    // nothing new to summarize

            const pending = generator.generate({
                systemPrompt: SUMMARY_SYSTEM_PROMPT,
                userMessage: buildSummaryPrompt(current?.text ?? null, newMessages),
                model,
                temperature: 0,
                maxTokens: 512,
            })
            const { text } = await withDeadline(pending, timeoutMs, 'summary generation')
            const summary = text.trim()
            if (!summary) {
                console.warn(`[memory] summarizer returned nothing for ${conversationId}, keeping previous summary`)
                return false
            }

            await memory.upsertSummary(conversationId, summary, newMessages[newMessages.length - 1].seq)
            console.log(`[memory] memory_long updated for conversation=${conversationId} (${summary.length} chars)`)
            return true
        } catch (err) {
            console.warn(`[memory] rolling summary update failed for ${conversationId}:`, errorMessage(err))
            return false
        }
    }
}
