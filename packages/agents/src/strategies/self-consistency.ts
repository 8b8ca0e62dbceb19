import { runBounded } from '@groundwork/shared'
import { CHAIN_OF_THOUGHT_PROMPT } from '../prompts'
import { settledValues, voteOnAnswer } from './selection'
import { askReasoner, reasonerMessage } from './shared'
import type { Candidate, ReasonerStep, ReasoningStrategy, StrategyParams, StrategyRuntime } from './types'

/** Independent samples at the sampling temperature, then a majority vote on the normalized answer. */
export class SelfConsistencyStrategy implements ReasoningStrategy {
    readonly name = 'self_consistency'

    constructor(private readonly runtime: StrategyRuntime) {}

    async execute(step: ReasonerStep, params: StrategyParams): Promise<Candidate[]> {
        const samples = Array.from({ length: Math.max(1, params.consistencySamples) }, (_, i) => i)
        const message = reasonerMessage(step)

        const results = await runBounded(samples, this.runtime.poolSize, sample =>
            askReasoner(this.runtime, CHAIN_OF_THOUGHT_PROMPT, message, sample, this.runtime.samplingTemperature)
        )
        return settledValues(results)
    }

    select(candidates: Candidate[]): Candidate {
        return voteOnAnswer(candidates)
    }
}
