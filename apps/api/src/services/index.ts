import { createRepositories } from '@groundwork/db'
import type { Repositories } from '@groundwork/db'
import { MemoryStore, MessageLog, OpenAIEmbedder, RetrievalEngine, RollingSummarizer } from '@groundwork/memory'
import { AgentRegistry, ModelRouter, OrchestrationEventLog, Orchestrator, TelemetryRecorder } from '@groundwork/agents'
import { KeyedLock } from '@groundwork/shared'
import type { AppConfig, Embedder, Generator } from '@groundwork/shared'
import { ChatService } from './chat-service'

export interface Services {
    config: AppConfig
    repositories: Repositories
    memory: MemoryStore
    log: MessageLog
    retrieval: RetrievalEngine
    registry: AgentRegistry
    events: OrchestrationEventLog
    orchestrator: Orchestrator
    summarizer: RollingSummarizer
    telemetry: TelemetryRecorder
    chat: ChatService
}

/** Swapped in by tests and local runs that bring their own providers or storage. */
export interface ServiceOverrides {
    repositories?: Repositories
    generator?: Generator
    embedder?: Embedder
    registry?: AgentRegistry
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
    const repositories = overrides.repositories ?? createRepositories(config.storage)
    const generator = overrides.generator ?? new ModelRouter({
        baseURL: config.llm.baseURL,
        apiKey: config.llm.apiKey,
        defaultModel: config.llm.chatModel,
    })
    const embedder = overrides.embedder ?? new OpenAIEmbedder({
        baseURL: config.llm.baseURL,
        apiKey: config.llm.apiKey,
        model: config.llm.embedModel,
    })

    const memory = new MemoryStore({ kv: repositories.memoryKv, summaries: repositories.summaries })
    // One ordering lock per conversation for appends and summary refreshes
    const conversationLock = new KeyedLock()
    const timeoutMs = config.reasoning.stepTimeoutMs

    const log = new MessageLog(repositories.messages, conversationLock)
    const retrieval = new RetrievalEngine(embedder, repositories.chunks, { timeoutMs })
    const registry = overrides.registry ?? new AgentRegistry()
    const events = new OrchestrationEventLog(config.reasoning.logSize)
    const orchestrator = new Orchestrator({ registry, generator, events, settings: config.reasoning })
    const summarizer = new RollingSummarizer({
        memory,
        log,
        generator,
        model: config.llm.summaryModel,
        lock: conversationLock,
        timeoutMs,
    })
    const telemetry = new TelemetryRecorder(repositories.interactions)

    const chat = new ChatService({
        conversations: repositories.conversations,
        log,
        memory,
        retrieval,
        generator,
        orchestrator,
        summarizer,
        telemetry,
        settings: {
            defaultTenant: config.defaultTenant,
            chatModel: config.llm.chatModel,
            timeoutMs,
            ...config.context,
        },
    })

    return { config, repositories, memory, log, retrieval, registry, events, orchestrator, summarizer, telemetry, chat }
}

export { ChatService } from './chat-service'
export type { ChatReply, ChatSettings, RagAnswer } from './chat-service'
