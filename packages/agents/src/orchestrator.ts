import { StepFailureError, errorMessage, withDeadline } from '@groundwork/shared'
import type {
    AgentType,
    GenerateParams,
    Generation,
    Generator,
    LogSeverity,
    OrchestrationStep,
    RetrievedChunk,
    StepStatus,
    StrategyName,
} from '@groundwork/shared'
import type { OrchestrationEventLog } from './events'
import { UsageMeter } from './lib/telemetry'
import { PLANNER_PROMPT, RESEARCHER_PROMPT, SYNTHESIZER_PROMPT, formatEvidence, numbered } from './prompts'
import type { AgentRegistry } from './registry'
import { createStrategy, parsePlan, voteAcrossStrategies } from './strategies'
import type { StrategyParams, StrategyRuntime, StrategyWinner } from './strategies'

// Fixed regardless of strategy; strategies only change how the reasoner works
export const PIPELINE: readonly AgentType[] = ['planner', 'researcher', 'reasoner', 'synthesizer']

const NEXT: Record<StepStatus, readonly StepStatus[]> = {
    pending: ['running', 'failed'],
    running: ['completed', 'failed'],
    completed: [],
    failed: [],
}

export interface OrchestratorSettings {
    stepTimeoutMs: number
    agentWaitMs: number
    poolSize: number
    samplingTemperature: number
    reactMaxSteps: number
}

export interface OrchestratorDeps {
    registry: AgentRegistry
    generator: Generator
    events: OrchestrationEventLog
    settings: OrchestratorSettings
}

export interface OrchestrationRequest {
    query: string
    /** Assembled prompt: memory, transcript, retrieved context and the query. */
    context: string
    chunks: RetrievedChunk[]
    strategies: StrategyName[]
    params: StrategyParams
    model?: string
    conversationId?: string
    signal?: AbortSignal
    /** Knowledge-base lookup for ReAct. Must not reject. */
    search?: (query: string) => Promise<RetrievedChunk[]>
}

export interface OrchestrationResult {
    answer: string
    steps: string[]
    sources: RetrievedChunk[]
    degraded: boolean
    cancelled: boolean
    failedStep?: AgentType
    strategy: StrategyName | null
    plan: OrchestrationStep[]
    usage: { inputTokens: number; outputTokens: number; cost: number }
}

interface RunState {
    request: OrchestrationRequest
    strategies: StrategyName[]
    meter: UsageMeter
    planSteps: string[]
    research: string
    winner: StrategyWinner | null
    answer: string
}

/** Chunks whose [n] marker appears in the answer; all of them when none is cited. */
export function citedSources(answer: string, chunks: RetrievedChunk[]): RetrievedChunk[] {
    const cited = new Set<number>()
    for (const match of answer.matchAll(/\[(\d+)\]/g)) cited.add(Number(match[1]))
    const used = chunks.filter(c => cited.has(c.rank))
    return used.length > 0 ? used : chunks
}

export class Orchestrator {
    constructor(private readonly deps: OrchestratorDeps) {}

    /**
     * Runs planner → researcher → reasoner → synthesizer. A planner failure
     * rejects with StepFailureError; any later failure, or cancellation,
     * resolves with a degraded result and the remaining steps left pending.
     */
    async run(request: OrchestrationRequest): Promise<OrchestrationResult> {
        const strategies: StrategyName[] = request.strategies.length > 0 ? [...new Set(request.strategies)] : ['standard']
        const plan: OrchestrationStep[] = PIPELINE.map((agentType, index) => ({
            index,
            agentType,
            agentId: null,
            status: 'pending',
            log: null,
            updatedAt: new Date(),
        }))
        const state: RunState = {
            request,
            strategies,
            meter: new UsageMeter(),
            planSteps: [],
            research: '',
            winner: null,
            answer: '',
        }

        this.log(request, 'info', `Orchestration started with ${strategies.join(', ')}`)

        for (const step of plan) {
            if (request.signal?.aborted) {
                this.log(request, 'warning', `Cancelled before the ${step.agentType} step; remaining steps not dispatched`)
                return this.finish(state, plan, { cancelled: true })
            }

            try {
                await this.runStep(step, state)
            } catch (err) {
                if (step.agentType === 'planner') throw new StepFailureError('planner', err)
                this.log(request, 'warning', `Returning a degraded answer after the ${step.agentType} step failed`, step.agentType)
                return this.finish(state, plan, { failedStep: step.agentType })
            }
        }

        this.log(request, 'success', 'Orchestration complete')
        return this.finish(state, plan, {})
    }

    // ── STEP LIFECYCLE ─────────────────────────────────────────────────────

    private async runStep(step: OrchestrationStep, state: RunState): Promise<void> {
        const { registry, settings } = this.deps
        const { request } = state

        const agent = await registry.acquire(step.agentType, { deadlineMs: settings.agentWaitMs }).catch((err: unknown) => {
            this.move(step, 'failed', errorMessage(err))
            this.log(request, 'error', errorMessage(err), step.agentType)
            throw err
        })

        step.agentId = agent.id
        this.move(step, 'running', `Dispatched to ${agent.name}`)
        this.log(request, 'info', `${agent.name} started`, step.agentType)

        try {
            const summary = await this.execute(step.agentType, state)
            this.move(step, 'completed', summary)
            this.log(request, 'success', `${agent.name}: ${summary}`, step.agentType)
        } catch (err) {
            console.warn(`[orchestrator] ${step.agentType} step failed:`, errorMessage(err))
            this.move(step, 'failed', errorMessage(err))
            this.log(request, 'error', `${agent.name} failed: ${errorMessage(err)}`, step.agentType)
            throw err
        } finally {
            await registry.release(agent.id)
        }
    }

    private move(step: OrchestrationStep, status: StepStatus, log: string): void {
        if (!NEXT[step.status].includes(status)) {
            throw new Error(`Step ${step.index} (${step.agentType}) cannot go from ${step.status} to ${status}`)
        }
        step.status = status
        step.log = log
        step.updatedAt = new Date()
    }

    private execute(agentType: AgentType, state: RunState): Promise<string> {
        switch (agentType) {
            case 'planner':
                return this.planStep(state)
            case 'researcher':
                return this.researchStep(state)
            case 'reasoner':
                return this.reasonStep(state)
            case 'synthesizer':
                return this.synthesizeStep(state)
        }
    }

    // ── AGENTS ─────────────────────────────────────────────────────────────

    private async planStep(state: RunState): Promise<string> {
        const { request } = state
        const { text } = await this.call(state, 'planner', {
            systemPrompt: PLANNER_PROMPT,
            userMessage: `# QUESTION\n${request.query}\n\n# CONTEXT\n${request.context}`,
            temperature: 0.2,
            maxTokens: 512,
        })
        const steps = parsePlan(text)
        state.planSteps = steps.length > 0 ? steps : [request.query]
        return `Planned ${state.planSteps.length} step(s)`
    }

    private async researchStep(state: RunState): Promise<string> {
        const { request } = state
        const { text } = await this.call(state, 'researcher', {
            systemPrompt: RESEARCHER_PROMPT,
            userMessage: [
                `# QUESTION\n${request.query}`,
                `# PLAN\n${numbered(state.planSteps)}`,
                `# CONTEXT\n${request.context}`,
            ].join('\n\n'),
            temperature: 0.2,
            maxTokens: 1024,
        })
        state.research = text.trim()
        return `Collected ${state.research.length} chars of notes from ${request.chunks.length} passage(s)`
    }

    private async reasonStep(state: RunState): Promise<string> {
        const { request } = state
        const runtime = this.runtime(state)
        const step = { query: request.query, plan: state.planSteps, research: state.research, chunks: request.chunks }

        const winners: StrategyWinner[] = []
        let firstError: unknown = null
        for (const name of state.strategies) {
            const strategy = createStrategy(name, runtime)
            try {
                const candidates = await strategy.execute(step, request.params)
                const candidate = strategy.select(candidates)
                winners.push({ strategy: name, candidate })
                this.log(request, 'info', `${name}: ${candidates.length} candidate(s), picked #${candidate.order + 1}`, 'reasoner')
            } catch (err) {
                firstError ??= err
                this.log(request, 'warning', `${name} failed: ${errorMessage(err)}`, 'reasoner')
            }
        }
        if (winners.length === 0) throw firstError ?? new Error('no reasoning strategy produced an answer')

        state.winner = voteAcrossStrategies(winners)
        state.answer = state.winner.candidate.answer
        return `${state.winner.strategy} answer selected from ${winners.length} strategy result(s)`
    }

    private async synthesizeStep(state: RunState): Promise<string> {
        const { request, winner } = state
        const reasoning = winner?.candidate.reasoning ?? []
        const { text } = await this.call(state, 'synthesizer', {
            systemPrompt: SYNTHESIZER_PROMPT,
            userMessage: [
                `# QUESTION\n${request.query}`,
                `# REASONING\n${reasoning.length > 0 ? numbered(reasoning) : '(none)'}`,
                `# PROPOSED ANSWER\n${state.answer}`,
                `# RETRIEVED CONTEXT\n${formatEvidence(request.chunks)}`,
            ].join('\n\n'),
            temperature: 0.2,
            maxTokens: 1024,
        })
        state.answer = text.trim() || state.answer
        return 'Final answer composed'
    }

    // ── CALLS ──────────────────────────────────────────────────────────────

    private call(state: RunState, agentType: AgentType, params: GenerateParams): Promise<Generation> {
        const { generator, settings } = this.deps
        const pending = generator
            .generate({ ...params, model: params.model ?? state.request.model })
            .then(generation => {
                state.meter.add(generation)
                return generation
            })
        return withDeadline(pending, settings.stepTimeoutMs, `${agentType} call`)
    }

    private runtime(state: RunState): StrategyRuntime {
        const { settings } = this.deps
        const search = state.request.search
        return {
            generate: params => this.call(state, 'reasoner', params),
            search: query => (search ? search(query) : Promise.resolve([])),
            poolSize: settings.poolSize,
            samplingTemperature: settings.samplingTemperature,
            reactMaxSteps: settings.reactMaxSteps,
        }
    }

    private finish(
        state: RunState,
        plan: OrchestrationStep[],
        outcome: { cancelled?: boolean; failedStep?: AgentType }
    ): OrchestrationResult {
        const synthesized = plan[plan.length - 1].status === 'completed'
        const reasoned = state.winner !== null
        const answer = synthesized || reasoned ? state.answer : ''
        const reasoning = state.winner?.candidate.reasoning ?? []

        return {
            answer,
            steps: reasoning.length > 0 ? reasoning : state.planSteps,
            sources: answer ? citedSources(answer, state.request.chunks) : [],
            degraded: Boolean(outcome.cancelled) || outcome.failedStep !== undefined,
            cancelled: Boolean(outcome.cancelled),
            failedStep: outcome.failedStep,
            strategy: state.winner?.strategy ?? null,
            plan,
            usage: {
                inputTokens: state.meter.inputTokens,
                outputTokens: state.meter.outputTokens,
                cost: state.meter.cost,
            },
        }
    }

    private log(request: OrchestrationRequest, severity: LogSeverity, message: string, agentType?: AgentType): void {
        this.deps.events.add(severity, message, { agentType, conversationId: request.conversationId })
    }
}
