import { describe, expect, it } from 'vitest'
import type { RetrievedChunk } from '@groundwork/shared'
import { formatReasoningResponse } from '../src'

const chunk: RetrievedChunk = {
    chunkId: 'k1',
    docId: 'd1',
    title: 'Atlas',
    uri: 'https://docs.example/atlas',
    text: 'Paris is the capital of France.',
    tenantId: 't1',
    distance: 0.1,
    rank: 1,
}

describe('formatReasoningResponse', () => {
    it('renders steps, answer and sources', () => {
        const out = formatReasoningResponse({
            steps: ['Find the country', 'Recall its capital'],
            answer: 'Paris [1]',
            sources: [chunk, { ...chunk, chunkId: 'k2', docId: 'd2', title: null, uri: null, rank: 2 }],
        })

        expect(out).toBe(
            '## Reasoning Steps\n\n' +
                '**Step 1:** Find the country\n\n' +
                '**Step 2:** Recall its capital\n\n' +
                '---\n\n' +
                '## Answer\n\nParis [1]\n\n' +
                '## Sources\n\n' +
                '[1] Atlas (https://docs.example/atlas)\n' +
                '[2] d2'
        )
    })

    it('falls back to a placeholder answer', () => {
        expect(formatReasoningResponse({ steps: [], answer: '', sources: [] })).toBe(
            '## Answer\n\nNo answer could be produced.'
        )
    })
})
