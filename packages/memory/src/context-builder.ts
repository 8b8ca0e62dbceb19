import type { Message, RetrievedChunk } from '@groundwork/shared'

export const NO_SUMMARY = '(none)'

export const GROUNDED_SYSTEM_PROMPT = `You are an assistant that answers using the conversation memory and the provided retrieved context.
Cite retrieved context inline with its marker, like [1] or [2].
If the answer is not in the retrieved context or the conversation, say "I don't know from the provided context."`

export function citationSource(chunk: RetrievedChunk): string {
    return chunk.uri ?? chunk.title ?? chunk.docId
}

/**
 * Lays out the generator prompt. The section order never changes:
 * summary, transcript, retrieved evidence, then the query closest to the
 * generation boundary.
 */
export function buildPrompt(
    summary: string | null,
    recentMessages: Message[],
    retrievedChunks: RetrievedChunk[],
    userQuery: string
): string {
    const sections: string[] = []

    // ── Rolling summary
    const memory = summary?.trim()
    sections.push(`[Memory]\n${memory ? memory : NO_SUMMARY}`)

    // ── Recent transcript
    const transcript = recentMessages.map(m => `- ${m.role}: ${m.content}`)
    sections.push(['[Recent messages]', ...transcript].join('\n'))

    // ── Retrieved evidence, markers match chunk rank
    const evidence = retrievedChunks.map(c => `[${c.rank}] ${c.text} (source: ${citationSource(c)})`)
    sections.push(['[Retrieved context]', ...evidence].join('\n'))

    // ── Current query (last, closest to the task)
    sections.push(`[User]\n${userQuery}`)

    return sections.join('\n\n')
}
