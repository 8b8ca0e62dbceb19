import { formatEvidence, numbered } from '../prompts'
import { parseReasonerOutput } from './output'
import type { Candidate, ReasonerStep, StrategyRuntime } from './types'

export function reasonerMessage(step: ReasonerStep, extra: string[] = []): string {
    return [
        `# QUESTION\n${step.query}`,
        `# PLAN\n${step.plan.length > 0 ? numbered(step.plan) : '(no plan)'}`,
        `# RESEARCH NOTES\n${step.research.trim() || '(none)'}`,
        `# RETRIEVED CONTEXT\n${formatEvidence(step.chunks)}`,
        ...extra,
    ].join('\n\n')
}

export async function askReasoner(
    runtime: StrategyRuntime,
    systemPrompt: string,
    userMessage: string,
    order: number,
    temperature = 0.2
): Promise<Candidate> {
    const { text } = await runtime.generate({ systemPrompt, userMessage, temperature, maxTokens: 1024, expectJson: true })
    return { ...parseReasonerOutput(text), order }
}
