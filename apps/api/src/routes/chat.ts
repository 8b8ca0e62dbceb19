import type { FastifyInstance } from 'fastify'
import { PromptSchema, RagQuestionSchema } from '@groundwork/shared'
import type { ChatService } from '../services'
import { publicMessage, statusFor } from '../http-errors'

export async function chatRoutes(app: FastifyInstance, opts: { chat: ChatService }) {
    const { chat } = opts

    // ── POST /chat ──────────────────────────────────────────────────────────
    app.post('/chat', async (req, reply) => {
        const body = PromptSchema.safeParse(req.body)
        if (!body.success) {
            const message = body.error.issues[0]?.message ?? 'Invalid request'
            return reply.status(400).send({ conversationId: null, content: '', errorMessage: message })
        }

        // Stop dispatching orchestration steps once the client has gone away
        const aborter = new AbortController()
        reply.raw.on('close', () => {
            if (!reply.raw.writableEnded) aborter.abort()
        })

        try {
            return await chat.chat(body.data, aborter.signal)
        } catch (err) {
            req.log.error({ err }, '[chat] request failed')
            return reply.status(statusFor(err)).send({
                conversationId: body.data.conversationId ?? null,
                content: '',
                errorMessage: publicMessage(err),
            })
        }
    })

    // ── POST /rag ───────────────────────────────────────────────────────────
    app.post('/rag', async (req, reply) => {
        const body = RagQuestionSchema.safeParse(req.body)
        if (!body.success) return reply.status(400).send({ error: body.error.flatten() })
        return chat.answer(body.data)
    })
}
