import type { AgentType } from './types'

export type ErrorCode =
    | 'invalid_input'
    | 'provider_error'
    | 'embedding_unavailable'
    | 'store_unavailable'
    | 'step_failure'
    | 'agent_unavailable'
    | 'deadline_exceeded'

export class GroundworkError extends Error {
    readonly code: ErrorCode
    readonly details: Record<string, unknown>

    constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'GroundworkError'
        this.code = code
        this.details = details
    }
}

/** Empty or malformed request; raised before anything is written. */
export class InvalidInputError extends GroundworkError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super('invalid_input', message, details)
        this.name = 'InvalidInputError'
    }
}

/** Embedding or generation backend failure. */
export class ProviderError extends GroundworkError {
    constructor(message: string, options?: { cause?: unknown; code?: ErrorCode }) {
        super(options?.code ?? 'provider_error', message, {}, { cause: options?.cause })
        this.name = 'ProviderError'
    }
}

export class EmbeddingUnavailableError extends ProviderError {
    constructor(cause?: unknown) {
        super('Embedding provider unavailable', { cause, code: 'embedding_unavailable' })
        this.name = 'EmbeddingUnavailableError'
    }
}

/** Memory, message log or retrieval store could not be reached. */
export class StoreUnavailableError extends GroundworkError {
    constructor(store: string, cause?: unknown) {
        super('store_unavailable', `${store} store unavailable`, { store }, { cause })
        this.name = 'StoreUnavailableError'
    }
}

export class StepFailureError extends GroundworkError {
    readonly agentType: AgentType

    constructor(agentType: AgentType, cause?: unknown) {
        super('step_failure', `The ${agentType} step failed`, { agentType }, { cause })
        this.name = 'StepFailureError'
        this.agentType = agentType
    }
}

export class AgentUnavailableError extends GroundworkError {
    constructor(agentType: AgentType, reason: string) {
        super('agent_unavailable', `No ${agentType} agent available: ${reason}`, { agentType })
        this.name = 'AgentUnavailableError'
    }
}

export class DeadlineExceededError extends GroundworkError {
    constructor(label: string, timeoutMs: number) {
        super('deadline_exceeded', `${label} timed out after ${timeoutMs}ms`, { label, timeoutMs })
        this.name = 'DeadlineExceededError'
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
