import { normalizeAnswer } from '@groundwork/shared'
import type { StrategyName } from '@groundwork/shared'
import { DecompositionStrategy } from './decomposition'
import { DirectStrategy } from './direct'
import { ReactStrategy } from './react'
import { majorityVote } from './selection'
import { SelfConsistencyStrategy } from './self-consistency'
import { SelfReflectionStrategy } from './self-reflection'
import { TreeOfThoughtsStrategy } from './tree-of-thoughts'
import type { Candidate, ReasoningStrategy, StrategyRuntime } from './types'

export function createStrategy(name: StrategyName, runtime: StrategyRuntime): ReasoningStrategy {
    switch (name) {
        case 'standard':
        case 'chain_of_thought':
            return new DirectStrategy(name, runtime)
        case 'tree_of_thoughts':
            return new TreeOfThoughtsStrategy(runtime)
        case 'self_consistency':
            return new SelfConsistencyStrategy(runtime)
        case 'react':
            return new ReactStrategy(runtime)
        case 'decomposition':
            return new DecompositionStrategy(runtime)
        case 'self_reflection':
            return new SelfReflectionStrategy(runtime)
    }
}

export interface StrategyWinner {
    strategy: StrategyName
    candidate: Candidate
}

/** Majority of the per-strategy winners; ties go to the strategy listed first. */
export function voteAcrossStrategies(winners: readonly StrategyWinner[]): StrategyWinner {
    return majorityVote(winners, w => normalizeAnswer(w.candidate.answer))
}

export { majorityVote, mostConfident, voteOnAnswer, settledValues } from './selection'
export { parseReasonerOutput, parsePlan, extractJson } from './output'
export type { Candidate, ReasonerStep, ReasoningStrategy, StrategyParams, StrategyRuntime } from './types'
