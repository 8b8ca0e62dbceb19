import { z } from 'zod'

const optionalString = z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' || v === 'undefined' ? undefined : v))

const EnvSchema = z.object({
    STORAGE_DRIVER: z.enum(['supabase', 'memory']).default('supabase'),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_KEY: optionalString,
    REDIS_URL: optionalString,

    LLM_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
    LLM_API_KEY: optionalString,
    CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
    SUMMARY_MODEL: optionalString,
    EMBED_MODEL: z.string().min(1).default('text-embedding-3-small'),

    DEFAULT_TENANT: z.string().min(1).default('default'),
    RECENT_MESSAGES: z.coerce.number().int().min(1).max(200).default(20),
    CONTEXT_BUDGET_CHARS: z.coerce.number().int().min(100).default(8000),
    MESSAGE_MAX_CHARS: z.coerce.number().int().min(50).default(1000),
    RETRIEVAL_TOP_K: z.coerce.number().int().min(1).max(50).default(5),

    STEP_TIMEOUT_MS: z.coerce.number().int().min(100).default(60_000),
    AGENT_WAIT_MS: z.coerce.number().int().min(0).default(10_000),
    REASONING_POOL_SIZE: z.coerce.number().int().min(1).max(32).default(3),
    SAMPLING_TEMPERATURE: z.coerce.number().min(0.05).max(2).default(0.7),
    REACT_MAX_STEPS: z.coerce.number().int().min(1).max(10).default(4),
    ORCHESTRATION_LOG_SIZE: z.coerce.number().int().min(10).default(200),

    KV_SWEEP_CRON: z.string().min(1).default('*/15 * * * *'),

    API_KEY: optionalString,
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
})

export interface AppConfig {
    storage:
        | { driver: 'memory' }
        | { driver: 'supabase'; supabaseUrl: string; supabaseKey: string; redisUrl: string }
    llm: {
        baseURL: string
        apiKey: string | undefined
        chatModel: string
        summaryModel: string
        embedModel: string
    }
    defaultTenant: string
    context: {
        recentMessages: number
        budgetChars: number
        maxMessageChars: number
        topK: number
    }
    reasoning: {
        stepTimeoutMs: number
        agentWaitMs: number
        poolSize: number
        samplingTemperature: number
        reactMaxSteps: number
        logSize: number
    }
    sweepCron: string
    apiKey: string | undefined
    port: number
}

/**
 * Parses process.env (or the given record) into a typed config.
 * Throws listing every missing or malformed variable at once.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env)
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
        throw new Error(`Invalid configuration: ${problems.join('; ')}`)
    }
    const e = parsed.data

    let storage: AppConfig['storage'] = { driver: 'memory' }
    if (e.STORAGE_DRIVER === 'supabase') {
        const { SUPABASE_URL: supabaseUrl, SUPABASE_SERVICE_KEY: supabaseKey, REDIS_URL: redisUrl } = e
        if (!supabaseUrl || !supabaseKey || !redisUrl) {
            const missing: string[] = []
            if (!supabaseUrl) missing.push('SUPABASE_URL')
            if (!supabaseKey) missing.push('SUPABASE_SERVICE_KEY')
            if (!redisUrl) missing.push('REDIS_URL')
            throw new Error(`Invalid configuration: ${missing.join(', ')} required when STORAGE_DRIVER=supabase`)
        }
        storage = { driver: 'supabase', supabaseUrl, supabaseKey, redisUrl }
    }

    return {
        storage,
        llm: {
            baseURL: e.LLM_BASE_URL,
            apiKey: e.LLM_API_KEY,
            chatModel: e.CHAT_MODEL,
            summaryModel: e.SUMMARY_MODEL ?? e.CHAT_MODEL,   // falls back to the chat model
            embedModel: e.EMBED_MODEL,
        },
        defaultTenant: e.DEFAULT_TENANT,
        context: {
            recentMessages: e.RECENT_MESSAGES,
            budgetChars: e.CONTEXT_BUDGET_CHARS,
            maxMessageChars: e.MESSAGE_MAX_CHARS,
            topK: e.RETRIEVAL_TOP_K,
        },
        reasoning: {
            stepTimeoutMs: e.STEP_TIMEOUT_MS,
            agentWaitMs: e.AGENT_WAIT_MS,
            poolSize: e.REASONING_POOL_SIZE,
            samplingTemperature: e.SAMPLING_TEMPERATURE,
            reactMaxSteps: e.REACT_MAX_STEPS,
            logSize: e.ORCHESTRATION_LOG_SIZE,
        },
        sweepCron: e.KV_SWEEP_CRON,
        apiKey: e.API_KEY,
        port: e.PORT,
    }
}
