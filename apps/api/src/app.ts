import Fastify from 'fastify'
import type { FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import type { Services } from './services'
import { publicMessage, statusFor } from './http-errors'
import { chatRoutes } from './routes/chat'
import { memoryRoutes } from './routes/memory'
import { agentsRoutes } from './routes/agents'
import { telemetryRoutes } from './routes/telemetry'

const OPEN_PATHS = ['/health', '/socket.io/']

export interface AppOptions {
    logger?: boolean
}

export function buildApp(services: Services, options: AppOptions = {}): FastifyInstance {
    const app = Fastify({ logger: options.logger ?? true })

    app.register(cors, {
        origin: true,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'x-api-key'],
    })

    // Only enforced when an API key is configured
    const apiKey = services.config.apiKey
    if (apiKey) {
        app.addHook('onRequest', async (req, reply) => {
            if (req.method === 'OPTIONS' || OPEN_PATHS.some(p => req.url.startsWith(p))) return
            if (req.headers['x-api-key'] !== apiKey) {
                return reply.status(401).send({ error: 'Unauthorized' })
            }
        })
    }

    app.setErrorHandler((err, req, reply) => {
        // Fastify's own client errors (bad JSON, body too large) keep their status and message
        const status = err.statusCode ?? statusFor(err)
        if (status >= 500) req.log.error({ err }, 'request failed')
        const message = err.statusCode && status < 500 ? err.message : publicMessage(err)
        return reply.status(status).send({ error: message })
    })

    app.get('/health', async () => ({ status: 'ok', ts: new Date().toISOString() }))

    app.register(chatRoutes, { chat: services.chat })
    app.register(memoryRoutes, { prefix: '/memory', memory: services.memory })
    app.register(agentsRoutes, { prefix: '/agents', registry: services.registry, events: services.events })
    app.register(telemetryRoutes, {
        prefix: '/telemetry',
        interactions: services.repositories.interactions,
        defaultTenant: services.config.defaultTenant,
    })

    return app
}
