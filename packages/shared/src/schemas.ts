import { z } from 'zod'
import type { JsonValue } from './types'

// ── Reasoning ─────────────────────────────────────────────────────────────────

export const STRATEGY_NAMES = [
    'standard',
    'chain_of_thought',
    'tree_of_thoughts',
    'self_consistency',
    'react',
    'decomposition',
    'self_reflection',
] as const

// Short names the chat UI sends
const STRATEGY_ALIASES: Record<string, (typeof STRATEGY_NAMES)[number]> = {
    cot: 'chain_of_thought',
    tot: 'tree_of_thoughts',
    consistency: 'self_consistency',
    decomposed: 'decomposition',
    least_to_most: 'decomposition',
    reflection: 'self_reflection',
}

export const StrategyNameSchema = z.preprocess(
    (value) => (typeof value === 'string' ? STRATEGY_ALIASES[value] ?? value : value),
    z.enum(STRATEGY_NAMES)
)

export const ReasoningConfigSchema = z.object({
    strategies: z.array(StrategyNameSchema).max(STRATEGY_NAMES.length).default([]),
    totDepth: z.number().int().min(1).max(8).default(3),
    consistencySamples: z.number().int().min(1).max(10).default(3),
    reflectionTurns: z.number().int().min(0).max(5).default(3),
})

// ── Requests ──────────────────────────────────────────────────────────────────

export const PromptSchema = z.object({
    conversationId: z.string().min(1).max(64).optional(),
    content: z.string().trim().min(1, 'content must not be empty').max(20_000),
    modelId: z.string().min(1).optional(),
    tenantId: z.string().min(1).max(64).optional(),
    useReasoning: z.boolean().default(false),
    reasoningConfig: ReasoningConfigSchema.optional(),
})

export const RagQuestionSchema = z.object({
    question: z.string().trim().min(1).max(20_000),
    tenantId: z.string().min(1).max(64).optional(),
    topK: z.number().int().min(1).max(50).optional(),
    docIds: z.array(z.string()).optional(),
    tags: z.array(z.string()).optional(),
    modelId: z.string().min(1).optional(),
})

export const KvParamsSchema = z.object({
    conversationId: z.string().min(1).max(64),
    key: z.string().min(1).max(256),
})

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ])
)

export const KvQuerySchema = z.object({
    ttlSeconds: z.coerce.number().int().positive().optional(),
})

export type StrategyName = (typeof STRATEGY_NAMES)[number]
export type ReasoningConfig = z.infer<typeof ReasoningConfigSchema>
export type Prompt = z.infer<typeof PromptSchema>
export type RagQuestion = z.infer<typeof RagQuestionSchema>
