import { CRITIQUE_PROMPT, REASONER_PROMPT, REVISE_PROMPT } from '../prompts'
import { CritiqueSchema, extractJson } from './output'
import { firstCandidate } from './selection'
import { askReasoner, reasonerMessage } from './shared'
import type { Candidate, ReasonerStep, ReasoningStrategy, StrategyParams, StrategyRuntime } from './types'

/**
 * Draft, then up to `reflectionTurns` critique/revise rounds. Stops early when
 * the critic approves or its reply cannot be read.
 */
export class SelfReflectionStrategy implements ReasoningStrategy {
    readonly name = 'self_reflection'

    constructor(private readonly runtime: StrategyRuntime) {}

    async execute(step: ReasonerStep, params: StrategyParams): Promise<Candidate[]> {
        let draft = await askReasoner(this.runtime, REASONER_PROMPT, reasonerMessage(step), 0)
        const critiques: string[] = []

        for (let turn = 1; turn <= params.reflectionTurns; turn++) {
            const review = await this.runtime.generate({
                systemPrompt: CRITIQUE_PROMPT,
                userMessage: reasonerMessage(step, [`# DRAFT ANSWER\n${draft.answer}`]),
                temperature: 0,
                maxTokens: 512,
                expectJson: true,
            })
            const critique = CritiqueSchema.safeParse(extractJson(review.text))
            if (!critique.success || critique.data.approved) break

            critiques.push(`Critique ${turn}: ${critique.data.critique}`)
            draft = await askReasoner(
                this.runtime,
                REVISE_PROMPT,
                reasonerMessage(step, [`# DRAFT ANSWER\n${draft.answer}`, `# CRITIQUE\n${critique.data.critique}`]),
                0
            )
        }

        return [{ ...draft, reasoning: [...draft.reasoning, ...critiques] }]
    }

    select(candidates: Candidate[]): Candidate {
        return firstCandidate(candidates)
    }
}
