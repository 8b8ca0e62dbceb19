import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import type { AgentRegistry, OrchestrationEventLog } from '@groundwork/agents'

const LogsQuery = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(50),
})

export async function agentsRoutes(app: FastifyInstance, opts: { registry: AgentRegistry; events: OrchestrationEventLog }) {
    const { registry, events } = opts

    // GET /agents → every registered agent with its current status
    app.get('/', async () => ({ agents: registry.list() }))

    // GET /agents/logs?limit=50 → rolling orchestration log, newest last
    app.get('/logs', async (req, reply) => {
        const query = LogsQuery.safeParse(req.query)
        if (!query.success) return reply.status(400).send({ error: query.error.flatten() })
        return { logs: events.recent(query.data.limit) }
    })
}
