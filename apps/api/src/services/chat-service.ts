import { randomUUID } from 'node:crypto'
import type { ConversationRepository } from '@groundwork/db'
import { GROUNDED_SYSTEM_PROMPT, buildPrompt, fitToBudget } from '@groundwork/memory'
import type { MemoryStore, MessageLog, RetrievalEngine, RollingSummarizer } from '@groundwork/memory'
import { citedSources, formatReasoningResponse } from '@groundwork/agents'
import type { Orchestrator, TelemetryRecorder } from '@groundwork/agents'
import { errorMessage, withDeadline } from '@groundwork/shared'
import type { Generation, Generator, Message, Prompt, RagQuestion, RetrievedChunk } from '@groundwork/shared'

export interface ChatSettings {
    defaultTenant: string
    chatModel: string
    /** Deadline for each direct generation call. */
    timeoutMs: number
    recentMessages: number
    budgetChars: number
    maxMessageChars: number
    topK: number
}

export interface ChatServiceDeps {
    conversations: ConversationRepository
    log: MessageLog
    memory: MemoryStore
    retrieval: RetrievalEngine
    generator: Generator
    orchestrator: Orchestrator
    summarizer: RollingSummarizer
    telemetry: TelemetryRecorder
    settings: ChatSettings
}

export interface ChatReply {
    conversationId: string
    content: string
    errorMessage: string | null
    steps?: string[]
    sources?: RetrievedChunk[]
    degraded?: boolean
}

export interface RagAnswer {
    answer: string
    sources: RetrievedChunk[]
    degraded: boolean
}

/**
 * One chat turn: persist the user message, assemble memory, transcript and
 * retrieved context, answer (directly or through the orchestrator), persist
 * the answer, then refresh the rolling summary and record telemetry.
 */
export class ChatService {
    constructor(private readonly deps: ChatServiceDeps) {}

    async chat(prompt: Prompt, signal?: AbortSignal): Promise<ChatReply> {
        const { conversations, log, memory, retrieval, orchestrator, summarizer, settings } = this.deps
        const started = Date.now()
        const tenantId = prompt.tenantId ?? settings.defaultTenant
        const conversationId = prompt.conversationId ?? randomUUID()
        const model = prompt.modelId ?? settings.chatModel

        await conversations.ensure({ id: conversationId, tenantId })
        const userMessage = await log.append(conversationId, 'user', prompt.content)

        // Independent reads; all three settle before the prompt is assembled
        const [summary, recent, retrieved] = await Promise.all([
            memory.summaryOrEmpty(conversationId),
            log.recentN(conversationId, settings.recentMessages + 1).catch((err: unknown): Message[] => {
                console.warn(`[chat] transcript unavailable for ${conversationId}:`, errorMessage(err))
                return []
            }),
            retrieval.retrieve(tenantId, prompt.content, settings.topK),
        ])

        // The current message goes in the [User] section, not the transcript
        const history = recent.filter(m => m.id !== userMessage.id).slice(-settings.recentMessages)
        const transcript = fitToBudget(history, settings)
        const context = buildPrompt(summary, transcript, retrieved.chunks, prompt.content)

        const strategies = prompt.reasoningConfig?.strategies ?? []
        let reply: ChatReply
        let usage: { inputTokens: number; outputTokens: number; cost: number }

        if (prompt.useReasoning && prompt.reasoningConfig && strategies.length > 0) {
            const config = prompt.reasoningConfig
            const result = await orchestrator.run({
                query: prompt.content,
                context,
                chunks: retrieved.chunks,
                strategies,
                params: {
                    totDepth: config.totDepth,
                    consistencySamples: config.consistencySamples,
                    reflectionTurns: config.reflectionTurns,
                },
                model,
                conversationId,
                signal,
                search: async query => (await retrieval.retrieve(tenantId, query, settings.topK)).chunks,
            })
            reply = {
                conversationId,
                content: formatReasoningResponse(result),
                errorMessage: result.failedStep ? `The ${result.failedStep} step failed; showing a partial answer` : null,
                steps: result.steps,
                sources: result.sources,
                degraded: result.degraded || retrieved.degraded,
            }
            usage = result.usage
        } else {
            const generation = await this.generate(context, model)
            reply = { conversationId, content: generation.text.trim(), errorMessage: null, degraded: retrieved.degraded }
            usage = generation
        }

        await log.append(conversationId, 'assistant', reply.content)
        await summarizer.refresh(conversationId)

        this.deps.telemetry.record({
            tenantId,
            route: prompt.useReasoning ? 'chat_reasoning' : 'chat',
            modelId: model,
            latencyMs: Date.now() - started,
            tokensIn: usage.inputTokens,
            tokensOut: usage.outputTokens,
            costEst: usage.cost,
            params: {
                conversationId,
                strategies,
                retrieved: retrieved.chunks.length,
                degraded: retrieved.degraded,
            },
            createdAt: new Date(),
        })
        return reply
    }

    /** Stateless question answering over the knowledge base. */
    async answer(question: RagQuestion): Promise<RagAnswer> {
        const { retrieval, settings } = this.deps
        const started = Date.now()
        const tenantId = question.tenantId ?? settings.defaultTenant
        const model = question.modelId ?? settings.chatModel

        const retrieved = await retrieval.retrieve(tenantId, question.question, question.topK ?? settings.topK, {
            docIds: question.docIds,
            tags: question.tags,
        })
        const generation = await this.generate(buildPrompt(null, [], retrieved.chunks, question.question), model)
        const answer = generation.text.trim()

        this.deps.telemetry.record({
            tenantId,
            route: 'rag',
            modelId: model,
            latencyMs: Date.now() - started,
            tokensIn: generation.inputTokens,
            tokensOut: generation.outputTokens,
            costEst: generation.cost,
            params: { topK: question.topK ?? settings.topK, retrieved: retrieved.chunks.length },
            createdAt: new Date(),
        })
        return { answer, sources: citedSources(answer, retrieved.chunks), degraded: retrieved.degraded }
    }

    private generate(userMessage: string, model: string): Promise<Generation> {
        const pending = this.deps.generator.generate({
            systemPrompt: GROUNDED_SYSTEM_PROMPT,
            userMessage,
            model,
            temperature: 0.2,
            maxTokens: 1024,
        })
        return withDeadline(pending, this.deps.settings.timeoutMs, 'generation')
    }
}
