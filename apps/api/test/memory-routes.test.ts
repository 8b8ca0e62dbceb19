import { describe, expect, it } from 'vitest'
import { setupApp } from './helpers'

describe('memory routes', () => {
    it('stores, reads and deletes a JSON value', async () => {
        const { app } = setupApp()

        const put = await app.inject({ method: 'PUT', url: '/memory/kv/c1/theme', payload: { mode: 'dark', size: 14 } })
        expect(put.statusCode).toBe(204)

        const get = await app.inject({ method: 'GET', url: '/memory/kv/c1/theme' })
        expect(get.statusCode).toBe(200)
        expect(get.json()).toEqual({ mode: 'dark', size: 14 })

        const del = await app.inject({ method: 'DELETE', url: '/memory/kv/c1/theme' })
        expect(del.statusCode).toBe(204)

        const gone = await app.inject({ method: 'GET', url: '/memory/kv/c1/theme' })
        expect(gone.statusCode).toBe(404)
        expect(gone.json()).toEqual({ error: 'Not found' })
    })

    it('returns a bare string as JSON', async () => {
        const { app } = setupApp()

        await app.inject({
            method: 'PUT',
            url: '/memory/kv/c1/name',
            headers: { 'content-type': 'application/json' },
            payload: '"Ada"',
        })
        const get = await app.inject({ method: 'GET', url: '/memory/kv/c1/name' })

        expect(get.headers['content-type']).toContain('application/json')
        expect(get.body).toBe('"Ada"')
    })

    it('keeps keys apart per conversation', async () => {
        const { app } = setupApp()

        await app.inject({ method: 'PUT', url: '/memory/kv/c1/topic', payload: { v: 1 } })

        expect((await app.inject({ method: 'GET', url: '/memory/kv/c2/topic' })).statusCode).toBe(404)
    })

    it('stores an expiry for a positive ttl', async () => {
        const { app, repositories } = setupApp()

        const put = await app.inject({ method: 'PUT', url: '/memory/kv/c1/otp?ttlSeconds=60', payload: { code: 'test-code' } })

        expect(put.statusCode).toBe(204)
        const stored = repositories.memoryKv.rows.get(JSON.stringify(['c1', 'otp']))
        expect(stored?.expiresAt).toBeInstanceOf(Date)
    })

    it('rejects a ttl that is not a positive integer', async () => {
        const { app } = setupApp()

        const res = await app.inject({ method: 'PUT', url: '/memory/kv/c1/otp?ttlSeconds=0', payload: { code: 'test-code' } })

        expect(res.statusCode).toBe(400)
        expect(res.json()).toEqual({ error: 'Invalid key or ttlSeconds' })
    })

    it('serves the rolling summary as text', async () => {
        const { app, repositories } = setupApp()

        const missing = await app.inject({ method: 'GET', url: '/memory/long/c1' })
        expect(missing.statusCode).toBe(404)
        expect(missing.json()).toEqual({ error: 'No summary yet' })

        await repositories.summaries.upsert('c1', '- prefers tea')
        const res = await app.inject({ method: 'GET', url: '/memory/long/c1' })

        expect(res.statusCode).toBe(200)
        expect(res.headers['content-type']).toContain('text/plain')
        expect(res.body).toBe('- prefers tea')
    })
})
