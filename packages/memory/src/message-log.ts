import type { MessageRepository } from '@groundwork/db'
import { KeyedLock } from '@groundwork/shared'
import type { Message, MessageRole } from '@groundwork/shared'

export const ELLIPSIS = '…'

export interface TranscriptBudget {
    budgetChars: number        // total across the window
    maxMessageChars: number    // per message, applied first
}

/**
 * Append-only transcript per conversation. Appends are serialized through the
 * conversation's lock; pass the lock the summarizer uses so an append also
 * waits for a summary refresh in progress.
 */
export class MessageLog {
    constructor(
        private readonly messages: MessageRepository,
        private readonly lock: KeyedLock = new KeyedLock()
    ) {}

    append(conversationId: string, role: MessageRole, content: string): Promise<Message> {
        return this.lock.run(conversationId, () => this.messages.insert({ conversationId, role, content }))
    }

    /** The latest `n` messages, oldest first. */
    async recentN(conversationId: string, n: number): Promise<Message[]> {
        if (n <= 0) return []
        const newestFirst = await this.messages.latest(conversationId, n)
        return newestFirst.slice(0, n).reverse()
    }

    /** Up to `limit` messages with seq above `afterSeq`, oldest first. */
    async since(conversationId: string, afterSeq: number, limit: number): Promise<Message[]> {
        if (limit <= 0) return []
        const oldestFirst = await this.messages.after(conversationId, afterSeq, limit)
        return oldestFirst.slice(0, limit)
    }
}

function clip(content: string, max: number): string {
    if (content.length <= max) return content
    return content.slice(0, max) + ELLIPSIS
}

/**
 * Fits a chronological window into a character budget, favouring recency.
 * Messages are kept newest to oldest while they fit; the first one that does
 * not fit is kept as the oldest message, cut so that it and its ellipsis fill
 * the remaining budget, or dropped when not even one character fits.
 * Anything older is dropped.
 */
export function fitToBudget(messages: Message[], budget: TranscriptBudget): Message[] {
    const kept: Message[] = []
    let remaining = budget.budgetChars

    for (let i = messages.length - 1; i >= 0; i--) {
        const message = messages[i]
        const content = clip(message.content, budget.maxMessageChars)
        if (content.length <= remaining) {
            kept.push({ ...message, content })
            remaining -= content.length
            continue
        }
        const room = remaining - ELLIPSIS.length
        if (room > 0) kept.push({ ...message, content: content.slice(0, room) + ELLIPSIS })
        break
    }

    return kept.reverse()
}
