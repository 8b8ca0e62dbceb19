import { DECOMPOSE_PROMPT, REASONER_PROMPT, SUB_QUESTION_PROMPT } from '../prompts'
import { DecompositionSchema, extractJson } from './output'
import { firstCandidate } from './selection'
import { askReasoner, reasonerMessage } from './shared'
import type { Candidate, ReasonerStep, ReasoningStrategy, StrategyRuntime } from './types'

/** Least-to-most: split into sub-questions, answer them in order, then compose. */
export class DecompositionStrategy implements ReasoningStrategy {
    readonly name = 'decomposition'

    constructor(private readonly runtime: StrategyRuntime) {}

    async execute(step: ReasonerStep): Promise<Candidate[]> {
        const split = await this.runtime.generate({
            systemPrompt: DECOMPOSE_PROMPT,
            userMessage: `# QUESTION\n${step.query}`,
            temperature: 0,
            maxTokens: 512,
            expectJson: true,
        })
        const parsed = DecompositionSchema.safeParse(extractJson(split.text))
        const subQuestions = parsed.success ? parsed.data.subQuestions : [step.query]

        const solved: string[] = []
        for (const question of subQuestions) {
            const { text } = await this.runtime.generate({
                systemPrompt: SUB_QUESTION_PROMPT,
                userMessage: reasonerMessage(step, [
                    ...(solved.length > 0 ? [`# EARLIER ANSWERS\n${solved.join('\n')}`] : []),
                    `# SUB-QUESTION\n${question}`,
                ]),
                temperature: 0.2,
                maxTokens: 512,
            })
            solved.push(`Q: ${question} A: ${text.trim()}`)
        }

        const final = await askReasoner(
            this.runtime,
            REASONER_PROMPT,
            reasonerMessage(step, [`# SUB-ANSWERS\n${solved.join('\n')}`]),
            0
        )
        return [{ ...final, reasoning: [...solved, ...final.reasoning] }]
    }

    select(candidates: Candidate[]): Candidate {
        return firstCandidate(candidates)
    }
}
