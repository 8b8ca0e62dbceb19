import { describe, expect, it, vi } from 'vitest'
import { InMemoryMemoryKv, InMemoryMessages, InMemorySummaries } from '@groundwork/db'
import { KeyedLock } from '@groundwork/shared'
import type { GenerateParams, Generation } from '@groundwork/shared'
import { MemoryStore, MessageLog, RollingSummarizer, buildSummaryPrompt } from '../src'

const generation = (text: string): Generation => ({ text, model: 'test-model', inputTokens: 12, outputTokens: 6, cost: 0 })

function setup(generate: (params: GenerateParams) => Promise<Generation>, timeoutMs?: number) {
    const summaries = new InMemorySummaries()
    const messages = new InMemoryMessages()
    const memory = new MemoryStore({ kv: new InMemoryMemoryKv(), summaries })
    const lock = new KeyedLock()
    const log = new MessageLog(messages, lock)
    const generator = { generate: vi.fn(generate) }
    const summarizer = new RollingSummarizer({ memory, log, generator, model: 'summary-model', lock, timeoutMs })
    return { summaries, messages, memory, log, generator, summarizer }
}

describe('buildSummaryPrompt', () => {
    it('marks a missing previous summary', () => {
        expect(buildSummaryPrompt(null, [])).toBe('PREVIOUS_SUMMARY:\n(none)\n\nNEW_MESSAGES:\n\n\nOUTPUT:')
    })
})

describe('RollingSummarizer', () => {
    it('summarizes the new messages and upserts the result', async () => {
        const { log, memory, generator, summarizer } = setup(async () => generation('- user greeted the assistant'))
        await log.append('c1', 'user', 'hi')
        await log.append('c1', 'assistant', 'hello')

        expect(await summarizer.refresh('c1')).toBe(true)
        expect(await memory.getSummary('c1')).toEqual({ found: true, value: '- user greeted the assistant' })
        expect(generator.generate).toHaveBeenCalledWith(
            expect.objectContaining({
                model: 'summary-model',
                temperature: 0,
                userMessage: 'PREVIOUS_SUMMARY:\n(none)\n\nNEW_MESSAGES:\n- user: hi\n- assistant: hello\n\nOUTPUT:',
            })
        )
    })

    it('does nothing without new messages', async () => {
        const { generator, summarizer, summaries } = setup(async () => generation('unused'))

        expect(await summarizer.refresh('c1')).toBe(false)
        expect(generator.generate).not.toHaveBeenCalled()
        expect(summaries.rows.size).toBe(0)
    })

    it('keeps the previous summary when the model fails or answers blank', async () => {
        const failing = setup(() => Promise.reject(new Error('provider down')))
        await failing.log.append('c1', 'user', 'hi')
        expect(await failing.summarizer.refresh('c1')).toBe(false)
        expect(failing.summaries.rows.size).toBe(0)

        const blank = setup(async () => generation('   '))
        await blank.log.append('c1', 'user', 'hi')
        expect(await blank.summarizer.refresh('c1')).toBe(false)
        expect(blank.summaries.rows.size).toBe(0)
    })

    it('records the newest summarized message as the watermark', async () => {
        const { log, summaries, summarizer } = setup(async () => generation('- greeting'))
        await log.append('c1', 'user', 'hi')
        const reply = await log.append('c1', 'assistant', 'hello')

        await summarizer.refresh('c1')

        expect(summaries.rows.get('c1')?.lastMessageSeq).toBe(reply.seq)
    })

    it('summarizes a message appended while a refresh is running', async () => {
        const { log, memory, generator, summarizer } = setup(async () => generation('unused'))
        const appends: Promise<unknown>[] = []
        await log.append('c1', 'user', 'hi')
        generator.generate
            .mockImplementationOnce(async () => {
                appends.push(log.append('c1', 'user', 'my name is Zed'))
                return generation('- user said hi')
            })
            .mockImplementationOnce(async () => generation('- user said hi\n- user is Zed'))

        expect(await summarizer.refresh('c1')).toBe(true)
        await Promise.all(appends)
        expect(await summarizer.refresh('c1')).toBe(true)

        expect(generator.generate.mock.calls[1][0].userMessage).toBe(
            'PREVIOUS_SUMMARY:\n- user said hi\n\nNEW_MESSAGES:\n- user: my name is Zed\n\nOUTPUT:'
        )
        expect(await memory.getSummary('c1')).toEqual({ found: true, value: '- user said hi\n- user is Zed' })
    })

    it('picks up a message stamped earlier than the summary', async () => {
        const { log, messages, generator, summarizer } = setup(async () => generation('- summary'))
        await log.append('c1', 'user', 'hi')
        await summarizer.refresh('c1')

        await log.append('c1', 'user', 'from a skewed clock')
        messages.rows[1].createdAt = new Date('2000-01-01T00:00:00Z')

        expect(await summarizer.refresh('c1')).toBe(true)
        expect(generator.generate.mock.calls[1][0].userMessage).toContain('NEW_MESSAGES:\n- user: from a skewed clock\n')
    })

    it('gives up on a summary model that does not answer and frees the conversation', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
        const { log, summaries, summarizer } = setup(() => new Promise<Generation>(() => {}), 20)
        await log.append('c1', 'user', 'hi')

        expect(await summarizer.refresh('c1')).toBe(false)
        expect(summaries.rows.size).toBe(0)
        expect((await log.append('c1', 'user', 'next')).content).toBe('next')
        expect(warn).toHaveBeenCalledWith(
            '[memory] rolling summary update failed for c1:',
            'summary generation timed out after 20ms'
        )
        warn.mockRestore()
    })
})
