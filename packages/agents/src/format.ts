import type { RetrievedChunk } from '@groundwork/shared'

export interface ReasoningDisplay {
    steps: string[]
    answer: string
    sources: RetrievedChunk[]
}

function sourceLine(chunk: RetrievedChunk): string {
    const name = chunk.title ?? chunk.docId
    return chunk.uri ? `[${chunk.rank}] ${name} (${chunk.uri})` : `[${chunk.rank}] ${name}`
}

/** Markdown shown in the chat window for reasoning-mode replies. */
export function formatReasoningResponse({ steps, answer, sources }: ReasoningDisplay): string {
    let out = ''

    if (steps.length > 0) {
        out += '## Reasoning Steps\n\n'
        steps.forEach((step, i) => {
            out += `**Step ${i + 1}:** ${step}\n\n`
        })
        out += '---\n\n'
    }

    out += `## Answer\n\n${answer || 'No answer could be produced.'}`

    if (sources.length > 0) {
        out += `\n\n## Sources\n\n${sources.map(sourceLine).join('\n')}`
    }
    return out
}
