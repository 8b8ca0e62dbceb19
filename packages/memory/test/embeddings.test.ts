import { describe, expect, it } from 'vitest'
import { decodeEmbedding } from '../src'

describe('decodeEmbedding', () => {
    it('accepts a bare vector or an object carrying one', () => {
        expect(decodeEmbedding([0.1, 0.2])).toEqual([0.1, 0.2])
        expect(decodeEmbedding({ embedding: [0.3], index: 0, object: 'embedding' })).toEqual([0.3])
        expect(decodeEmbedding({ values: [0.4, 0.5] })).toEqual([0.4, 0.5])
    })

    it('rejects anything else', () => {
        expect(() => decodeEmbedding({ data: [1] })).toThrow('Unsupported embedding payload')
        expect(() => decodeEmbedding([])).toThrow('Unsupported embedding payload')
        expect(() => decodeEmbedding(['a'])).toThrow('Unsupported embedding payload')
    })
})
