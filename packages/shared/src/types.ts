// ── Conversations & Messages ──────────────────────────────────────────────────

export type ConversationStatus = 'active' | 'archived'

export interface Conversation {
    id: string
    tenantId: string
    userId: string | null
    status: ConversationStatus
}

export type MessageRole = 'user' | 'assistant' | 'system'

export interface Message {
    id: string
    conversationId: string
    role: MessageRole
    content: string
    seq: number          // strictly increasing per conversation
    createdAt: Date
}

// ── Memory ────────────────────────────────────────────────────────────────────

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue }

export interface MemoryEntry {
    conversationId: string
    key: string
    value: JsonValue
    expiresAt: Date | null
}

export interface RollingSummary {
    conversationId: string
    text: string
    /** seq of the newest message folded into `text`; 0 before any. */
    lastMessageSeq: number
    updatedAt: Date
}

export type Lookup<T> = { found: true; value: T } | { found: false }

// ── Retrieval ─────────────────────────────────────────────────────────────────

export interface RetrievedChunk {
    chunkId: string
    docId: string
    title: string | null
    uri: string | null
    text: string
    tenantId: string
    distance: number     // lower = more relevant
    rank: number         // 1-based, after ordering
}

export interface RetrievalFilters {
    docIds?: string[]
    tags?: string[]
}

// ── Agents & Orchestration ────────────────────────────────────────────────────

export type AgentType = 'planner' | 'researcher' | 'reasoner' | 'synthesizer'

export type AgentStatus = 'available' | 'busy' | 'offline'

export interface Agent {
    id: string
    type: AgentType
    name: string
    version: string
    status: AgentStatus
    capabilities: string[]
    description: string
}

export type StepStatus = 'pending' | 'running' | 'completed' | 'failed'

export interface OrchestrationStep {
    index: number
    agentType: AgentType
    agentId: string | null
    status: StepStatus
    log: string | null
    updatedAt: Date
}

export type LogSeverity = 'success' | 'error' | 'info' | 'warning'

export interface OrchestrationLog {
    id: number
    timestamp: number
    severity: LogSeverity
    message: string
    agentType?: AgentType
    conversationId?: string
}

// ── Telemetry ─────────────────────────────────────────────────────────────────

export interface InteractionEvent {
    tenantId: string
    route: string
    modelId: string
    latencyMs: number
    tokensIn: number
    tokensOut: number
    costEst: number
    params?: Record<string, unknown>
    createdAt: Date
}

// ── Providers ─────────────────────────────────────────────────────────────────

export interface GenerateParams {
    systemPrompt: string
    userMessage: string
    model?: string
    temperature?: number
    maxTokens?: number
    expectJson?: boolean
}

export interface Generation {
    text: string
    model: string
    inputTokens: number
    outputTokens: number
    cost: number
}

/** Black-box text generation: prompt in, text out. */
export interface Generator {
    generate(params: GenerateParams): Promise<Generation>
}

/** Black-box embedding: text in, vector out. */
export interface Embedder {
    embed(text: string): Promise<number[]>
}
