import { runBounded } from '@groundwork/shared'
import { BRANCH_PROMPT } from '../prompts'
import { mostConfident, settledValues } from './selection'
import { askReasoner, reasonerMessage } from './shared'
import type { Candidate, ReasonerStep, ReasoningStrategy, StrategyParams, StrategyRuntime } from './types'

/**
 * Expands the step into `totDepth` independent branches run on the bounded
 * pool. Failed branches drop out; the most confident survivor wins.
 */
export class TreeOfThoughtsStrategy implements ReasoningStrategy {
    readonly name = 'tree_of_thoughts'

    constructor(private readonly runtime: StrategyRuntime) {}

    async execute(step: ReasonerStep, params: StrategyParams): Promise<Candidate[]> {
        const width = Math.max(1, params.totDepth)
        const branches = Array.from({ length: width }, (_, i) => i)

        const results = await runBounded(branches, this.runtime.poolSize, branch =>
            askReasoner(
                this.runtime,
                BRANCH_PROMPT,
                reasonerMessage(step, [`# BRANCH\nApproach ${branch + 1} of ${width}: take a line of reasoning the other branches are unlikely to take.`]),
                branch,
                this.runtime.samplingTemperature
            )
        )
        return settledValues(results)
    }

    select(candidates: Candidate[]): Candidate {
        return mostConfident(candidates)
    }
}
