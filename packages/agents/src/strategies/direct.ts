import type { StrategyName } from '@groundwork/shared'
import { CHAIN_OF_THOUGHT_PROMPT, REASONER_PROMPT } from '../prompts'
import { firstCandidate } from './selection'
import { askReasoner, reasonerMessage } from './shared'
import type { Candidate, ReasonerStep, ReasoningStrategy, StrategyRuntime } from './types'

/** Single reasoner call. `standard` answers directly; `chain_of_thought` reasons step by step first. */
export class DirectStrategy implements ReasoningStrategy {
    constructor(
        readonly name: Extract<StrategyName, 'standard' | 'chain_of_thought'>,
        private readonly runtime: StrategyRuntime
    ) {}

    async execute(step: ReasonerStep): Promise<Candidate[]> {
        const prompt = this.name === 'chain_of_thought' ? CHAIN_OF_THOUGHT_PROMPT : REASONER_PROMPT
        return [await askReasoner(this.runtime, prompt, reasonerMessage(step), 0)]
    }

    select(candidates: Candidate[]): Candidate {
        return firstCandidate(candidates)
    }
}
