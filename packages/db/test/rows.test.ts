import { describe, expect, it } from 'vitest'
import { ChunkRow, MessageRow, SummaryRow } from '../src/rows'

describe('row decoders', () => {
    it('decodes a message row', () => {
        const message = MessageRow.parse({
            id: 'm1',
            conversation_id: 'c1',
            role: 'assistant',
            content: null,
            seq: '7',
            created_at: '2026-03-01T10:00:00.000Z',
        })

        expect(message).toEqual({
            id: 'm1',
            conversationId: 'c1',
            role: 'assistant',
            content: '',
            seq: 7,
            createdAt: new Date('2026-03-01T10:00:00.000Z'),
        })
    })

    it('reads a null summary text as empty', () => {
        const summary = SummaryRow.parse({ conversation_id: 'c1', summary_text: null, updated_at: '2026-03-01T10:00:00.000Z' })

        expect(summary.text).toBe('')
    })

    it('decodes a vector match with a numeric id', () => {
        const chunk = ChunkRow.parse({ chunk_id: 42, doc_id: 'd1', text: 'Paris', tenant_id: 't1', distance: '0.25' })

        expect(chunk).toEqual({ chunkId: '42', docId: 'd1', title: null, uri: null, text: 'Paris', tenantId: 't1', distance: 0.25 })
    })

    it('rejects an unknown role', () => {
        expect(() =>
            MessageRow.parse({ id: 'm1', conversation_id: 'c1', role: 'tool', content: 'x', seq: 1, created_at: '2026-03-01' })
        ).toThrow()
    })
})
