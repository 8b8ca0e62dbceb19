import { vi } from 'vitest'
import type { GenerateParams, Generation } from '@groundwork/shared'
import {
    BRANCH_PROMPT,
    CHAIN_OF_THOUGHT_PROMPT,
    PLANNER_PROMPT,
    REASONER_PROMPT,
    RESEARCHER_PROMPT,
    SYNTHESIZER_PROMPT,
} from '../src/prompts'
import type { StrategyRuntime } from '../src'

export const generation = (text: string): Generation => ({
    text,
    model: 'test-model',
    inputTokens: 10,
    outputTokens: 5,
    cost: 0.001,
})

export const reasonerJson = (answer: string, confidence = 0.5, reasoning: string[] = []) =>
    JSON.stringify({ reasoning, answer, confidence })

export type Role = 'planner' | 'researcher' | 'reasoner' | 'synthesizer' | 'other'

export function roleOf(params: GenerateParams): Role {
    switch (params.systemPrompt) {
        case PLANNER_PROMPT:
            return 'planner'
        case RESEARCHER_PROMPT:
            return 'researcher'
        case REASONER_PROMPT:
        case CHAIN_OF_THOUGHT_PROMPT:
        case BRANCH_PROMPT:
            return 'reasoner'
        case SYNTHESIZER_PROMPT:
            return 'synthesizer'
        default:
            return 'other'
    }
}

/** A generator that answers each pipeline role from the given script. */
export function scriptedGenerator(script: Partial<Record<Role, (params: GenerateParams) => string | Promise<string>>>) {
    return {
        generate: vi.fn(async (params: GenerateParams) => {
            const reply = script[roleOf(params)]
            if (!reply) throw new Error(`no scripted reply for ${roleOf(params)}`)
            return generation(await reply(params))
        }),
    }
}

/** Replies in call order, one per generate() call. */
export function sequenceRuntime(replies: Array<string | Error>, overrides: Partial<StrategyRuntime> = {}) {
    let call = 0
    const generate = vi.fn(async (_params: GenerateParams) => {
        const reply = replies[call++]
        if (reply === undefined) throw new Error('script exhausted')
        if (reply instanceof Error) throw reply
        return generation(reply)
    })
    const runtime: StrategyRuntime = {
        generate,
        search: vi.fn(async () => []),
        poolSize: 3,
        samplingTemperature: 0.7,
        reactMaxSteps: 3,
        ...overrides,
    }
    return { runtime, generate }
}
