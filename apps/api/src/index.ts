import 'dotenv/config'
import { Server } from 'socket.io'
import { closeClients } from '@groundwork/db'
import { startKvSweeper } from '@groundwork/memory'
import { errorMessage, loadConfig } from '@groundwork/shared'
import { buildApp } from './app'
import { createServices } from './services'

const config = loadConfig()
const services = createServices(config)
const app = buildApp(services)

// ── Live inspection feed ────────────────────────────────────────────────────
const io = new Server(app.server, {
    cors: {
        origin: '*',
        methods: ['GET', 'POST'],
    },
})

io.on('connection', (socket) => {
    console.log('[Socket] Client connected:', socket.id)

    socket.on('orchestration:subscribe', (conversationId: unknown) => {
        if (typeof conversationId !== 'string') return
        void socket.join(`conversation:${conversationId}`)
    })

    socket.on('orchestration:unsubscribe', (conversationId: unknown) => {
        if (typeof conversationId !== 'string') return
        void socket.leave(`conversation:${conversationId}`)
    })
})

// Conversation-scoped entries go to that room; the rest to everyone
services.events.subscribe((entry) => {
    if (entry.conversationId) io.to(`conversation:${entry.conversationId}`).emit('orchestration:log', entry)
    else io.emit('orchestration:log', entry)
})
services.registry.subscribe((agent) => {
    io.emit('agent:status', agent)
})

const sweeper = startKvSweeper(services.memory, config.sweepCron)

const shutdown = async (signal: string) => {
    console.log(`[API] ${signal} received, shutting down`)
    sweeper.stop()
    await app.close()
    io.close()
    await services.telemetry.flush()
    await closeClients()
    process.exit(0)
}

process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err: unknown) => {
        console.error('[API] shutdown failed:', errorMessage(err))
        process.exit(1)
    })
})
process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err: unknown) => {
        console.error('[API] shutdown failed:', errorMessage(err))
        process.exit(1)
    })
})

const start = async () => {
    try {
        await app.listen({ port: config.port, host: '0.0.0.0' })
        console.log(`Groundwork API running at http://localhost:${config.port}`)
    } catch (err) {
        app.log.error(err)
        process.exit(1)
    }
}

void start()
