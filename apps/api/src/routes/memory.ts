import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import { JsonValueSchema, KvParamsSchema, KvQuerySchema } from '@groundwork/shared'
import type { MemoryStore } from '@groundwork/memory'

const ConversationParams = z.object({ conversationId: z.string().min(1).max(64) })

export async function memoryRoutes(app: FastifyInstance, opts: { memory: MemoryStore }) {
    const { memory } = opts

    // PUT /memory/kv/:conversationId/:key?ttlSeconds=60 with any JSON body
    app.put('/kv/:conversationId/:key', async (req, reply) => {
        const params = KvParamsSchema.safeParse(req.params)
        const query = KvQuerySchema.safeParse(req.query)
        const value = JsonValueSchema.safeParse(req.body)
        if (!params.success || !query.success) return reply.status(400).send({ error: 'Invalid key or ttlSeconds' })
        if (!value.success) return reply.status(400).send({ error: 'Body must be a JSON value' })

        await memory.set(params.data.conversationId, params.data.key, value.data, query.data.ttlSeconds)
        return reply.status(204).send()
    })

    app.get('/kv/:conversationId/:key', async (req, reply) => {
        const params = KvParamsSchema.safeParse(req.params)
        if (!params.success) return reply.status(400).send({ error: 'Invalid key' })

        const entry = await memory.get(params.data.conversationId, params.data.key)
        if (!entry.found) return reply.status(404).send({ error: 'Not found' })
        // Serialize ourselves so a bare string still goes out as JSON
        return reply.type('application/json').send(JSON.stringify(entry.value))
    })

    app.delete('/kv/:conversationId/:key', async (req, reply) => {
        const params = KvParamsSchema.safeParse(req.params)
        if (!params.success) return reply.status(400).send({ error: 'Invalid key' })

        await memory.delete(params.data.conversationId, params.data.key)
        return reply.status(204).send()
    })

    // GET /memory/long/:conversationId → rolling summary as text
    app.get('/long/:conversationId', async (req, reply) => {
        const params = ConversationParams.safeParse(req.params)
        if (!params.success) return reply.status(400).send({ error: 'Invalid conversation id' })

        const summary = await memory.getSummary(params.data.conversationId)
        if (!summary.found) return reply.status(404).send({ error: 'No summary yet' })
        return reply.type('text/plain; charset=utf-8').send(summary.value)
    })
}
