import { vi } from 'vitest'
import { createInMemoryRepositories } from '@groundwork/db'
import type { StoredChunk } from '@groundwork/db'
import { GROUNDED_SYSTEM_PROMPT } from '@groundwork/memory'
import { loadConfig } from '@groundwork/shared'
import type { GenerateParams, Generation } from '@groundwork/shared'
import { buildApp } from '../src/app'
import { createServices } from '../src/services'

export type Reply = (params: GenerateParams) => string | Promise<string>

export const atlas: StoredChunk = {
    chunkId: 'k1',
    docId: 'd1',
    title: 'Atlas',
    uri: 'https://docs.example/atlas',
    text: 'Paris is the capital of France.',
    tenantId: 'default',
    embedding: [1, 0],
}

// Anything that is not a grounded answer is the rolling summarizer here
export const defaultReply: Reply = params =>
    params.systemPrompt === GROUNDED_SYSTEM_PROMPT ? 'Hello! How can I help?' : '- The user said hello.'

export function setupApp(options: { reply?: Reply; env?: Record<string, string> } = {}) {
    const reply = options.reply ?? defaultReply
    const repositories = createInMemoryRepositories()
    const generator = {
        generate: vi.fn(async (params: GenerateParams): Promise<Generation> => ({
            text: await reply(params),
            model: 'test-model',
            inputTokens: 10,
            outputTokens: 5,
            cost: 0,
        })),
    }
    const embedder = { embed: vi.fn(async (_text: string) => [1, 0]) }

    const config = loadConfig({ STORAGE_DRIVER: 'memory', AGENT_WAIT_MS: '50', ...options.env })
    const services = createServices(config, { repositories, generator, embedder })
    const app = buildApp(services, { logger: false })
    return { app, services, repositories, generator, embedder }
}

/** The grounded-answer calls, in order. */
export function answerCalls(generator: ReturnType<typeof setupApp>['generator']): GenerateParams[] {
    return generator.generate.mock.calls.map(([params]) => params).filter(p => p.systemPrompt === GROUNDED_SYSTEM_PROMPT)
}
