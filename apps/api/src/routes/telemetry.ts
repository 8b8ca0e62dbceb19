import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import type { InteractionRepository } from '@groundwork/db'

const EventsQuery = z.object({
    tenantId: z.string().min(1).max(64).optional(),
    limit: z.coerce.number().int().min(1).max(200).default(50),
})

export async function telemetryRoutes(app: FastifyInstance, opts: { interactions: InteractionRepository; defaultTenant: string }) {
    /**
     * GET /telemetry/events?tenantId=acme&limit=50
     * Recent interaction events for a tenant, newest first.
     */
    app.get('/events', async (req, reply) => {
        const query = EventsQuery.safeParse(req.query)
        if (!query.success) return reply.status(400).send({ error: query.error.flatten() })

        const tenantId = query.data.tenantId ?? opts.defaultTenant
        const events = await opts.interactions.recent(tenantId, query.data.limit)
        return { tenantId, events }
    })
}
