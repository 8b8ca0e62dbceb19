import OpenAI from 'openai'
import { ProviderError } from '@groundwork/shared'
import type { GenerateParams, Generation, Generator } from '@groundwork/shared'

// Reference prices in USD per 1M tokens, for telemetry cost estimates.
// Unknown models are costed at zero.
const PRICING: Record<string, { input: number; output: number }> = {
    'gpt-4o': { input: 2.50, output: 10.00 },
    'gpt-4o-mini': { input: 0.15, output: 0.60 },
    'llama-3.1-8b-instant': { input: 0.05, output: 0.08 },
    'llama-3.3-70b-versatile': { input: 0.59, output: 0.79 },
    'command-a-03-2025': { input: 2.50, output: 10.00 },
}

export function calculateCost(model: string, input: number, output: number): number {
    const p = PRICING[model] ?? { input: 0, output: 0 }
    return (input / 1_000_000) * p.input + (output / 1_000_000) * p.output
}

export interface ModelRouterOptions {
    baseURL: string
    apiKey: string | undefined
    defaultModel: string
}

/** Chat completions against any OpenAI-compatible endpoint. */
export class ModelRouter implements Generator {
    private readonly client: OpenAI
    private readonly defaultModel: string

    constructor(options: ModelRouterOptions, client?: OpenAI) {
        this.client = client ?? new OpenAI({ baseURL: options.baseURL, apiKey: options.apiKey ?? 'not-set' })
        this.defaultModel = options.defaultModel
    }

    async generate(params: GenerateParams): Promise<Generation> {
        const model = params.model ?? this.defaultModel

        const response = await this.client.chat.completions
            .create({
                model,
                max_tokens: params.maxTokens ?? 1024,
                temperature: params.temperature,
                response_format: params.expectJson ? { type: 'json_object' } : undefined,
                messages: [
                    { role: 'system', content: params.systemPrompt },
                    { role: 'user', content: params.userMessage },
                ],
            })
            .catch((err: unknown) => {
                console.error(`[model] ${model} call failed:`, err instanceof Error ? err.message : err)
                throw new ProviderError('Generation provider unavailable', { cause: err })
            })

        const text = response.choices[0]?.message?.content ?? ''
        const inputTokens = response.usage?.prompt_tokens ?? 0
        const outputTokens = response.usage?.completion_tokens ?? 0

        return { text, model, inputTokens, outputTokens, cost: calculateCost(model, inputTokens, outputTokens) }
    }
}
