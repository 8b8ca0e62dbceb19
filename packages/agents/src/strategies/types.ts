import type { GenerateParams, Generation, RetrievedChunk, StrategyName } from '@groundwork/shared'

/** One reasoner answer. `order` is the submission index inside its strategy. */
export interface Candidate {
    answer: string
    confidence: number
    reasoning: string[]
    order: number
}

/** What the reasoner step receives from the steps before it. */
export interface ReasonerStep {
    query: string
    plan: string[]
    research: string
    chunks: RetrievedChunk[]
}

export interface StrategyParams {
    totDepth: number
    consistencySamples: number
    reflectionTurns: number
}

/**
 * Per-run services handed to a strategy. `generate` already carries the
 * step deadline and usage accounting; `search` never rejects.
 */
export interface StrategyRuntime {
    generate(params: GenerateParams): Promise<Generation>
    search(query: string): Promise<RetrievedChunk[]>
    poolSize: number
    samplingTemperature: number
    reactMaxSteps: number
}

export interface ReasoningStrategy {
    readonly name: StrategyName
    execute(step: ReasonerStep, params: StrategyParams): Promise<Candidate[]>
    select(candidates: Candidate[]): Candidate
}
