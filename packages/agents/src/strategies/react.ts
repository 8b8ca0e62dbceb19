import type { RetrievedChunk } from '@groundwork/shared'
import { REACT_PROMPT, REASONER_PROMPT } from '../prompts'
import { ReactTurnSchema, extractJson } from './output'
import { firstCandidate } from './selection'
import { askReasoner, reasonerMessage } from './shared'
import type { Candidate, ReasonerStep, ReasoningStrategy, StrategyRuntime } from './types'

function observe(chunks: RetrievedChunk[]): string {
    if (chunks.length === 0) return 'No results.'
    return chunks.map(c => `[${c.rank}] ${c.text}`).join('\n')
}

/**
 * Thought / action loop. `search` goes to the knowledge base and its results
 * come back as the next observation; `finish` ends the loop. After
 * `reactMaxSteps` turns without a finish the reasoner answers from the trace.
 */
export class ReactStrategy implements ReasoningStrategy {
    readonly name = 'react'

    constructor(private readonly runtime: StrategyRuntime) {}

    async execute(step: ReasonerStep): Promise<Candidate[]> {
        const trace: string[] = []
        const thoughts: string[] = []

        for (let turn = 1; turn <= this.runtime.reactMaxSteps; turn++) {
            const { text } = await this.runtime.generate({
                systemPrompt: REACT_PROMPT,
                userMessage: reasonerMessage(step, trace.length > 0 ? [`# TRACE\n${trace.join('\n')}`] : []),
                temperature: 0.2,
                maxTokens: 512,
                expectJson: true,
            })

            const parsed = ReactTurnSchema.safeParse(extractJson(text))
            if (!parsed.success) {
                // Not following the protocol; take the reply as the answer
                return [{ answer: text.trim(), confidence: 0, reasoning: thoughts, order: 0 }]
            }

            const { thought, action, input } = parsed.data
            if (thought) thoughts.push(thought)
            if (action === 'finish') {
                return [{ answer: input, confidence: 1, reasoning: thoughts, order: 0 }]
            }

            const observation = observe(await this.runtime.search(input))
            thoughts.push(`Searched "${input}"`)
            trace.push(`Thought: ${thought}`, `Action: search[${input}]`, `Observation: ${observation}`)
        }

        const final = await askReasoner(
            this.runtime,
            REASONER_PROMPT,
            reasonerMessage(step, [`# TRACE\n${trace.join('\n')}`]),
            0
        )
        return [{ ...final, reasoning: [...thoughts, ...final.reasoning] }]
    }

    select(candidates: Candidate[]): Candidate {
        return firstCandidate(candidates)
    }
}
