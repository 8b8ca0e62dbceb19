import { describe, expect, it } from 'vitest'
import { InMemoryMessages } from '@groundwork/db'
import { KeyedLock } from '@groundwork/shared'
import type { Message } from '@groundwork/shared'
import { ELLIPSIS, MessageLog, fitToBudget } from '../src'

function message(seq: number, content: string): Message {
    return { id: `m${seq}`, conversationId: 'c1', role: 'user', content, seq, createdAt: new Date(0) }
}

describe('MessageLog', () => {
    it('returns at most n messages, oldest first', async () => {
        const log = new MessageLog(new InMemoryMessages())
        for (let i = 1; i <= 5; i++) await log.append('c1', i % 2 ? 'user' : 'assistant', `m${i}`)

        const recent = await log.recentN('c1', 3)
        expect(recent.map(m => m.content)).toEqual(['m3', 'm4', 'm5'])
        expect(recent[0].seq).toBeLessThan(recent[1].seq)

        expect((await log.recentN('c1', 10)).map(m => m.content)).toEqual(['m1', 'm2', 'm3', 'm4', 'm5'])
        expect(await log.recentN('c1', 0)).toEqual([])
    })

    it('keeps conversations apart', async () => {
        const log = new MessageLog(new InMemoryMessages())
        await log.append('c1', 'user', 'hello')
        await log.append('c2', 'user', 'other')

        expect((await log.recentN('c1', 5)).map(m => m.content)).toEqual(['hello'])
    })

    it('assigns increasing order keys to concurrent appends in submission order', async () => {
        const log = new MessageLog(new InMemoryMessages())
        const appended = await Promise.all(
            Array.from({ length: 10 }, (_, i) => log.append('c1', 'user', `msg ${i}`))
        )

        const seqs = appended.map(m => m.seq)
        expect(seqs).toEqual([...seqs].sort((a, b) => a - b))
        expect((await log.recentN('c1', 10)).map(m => m.content)).toEqual(appended.map(m => m.content))
    })

    it('reads messages after an order key, oldest first', async () => {
        const log = new MessageLog(new InMemoryMessages())
        const first = await log.append('c1', 'user', 'one')
        await log.append('c1', 'assistant', 'two')
        await log.append('c1', 'user', 'three')
        await log.append('c2', 'user', 'elsewhere')

        expect((await log.since('c1', first.seq, 10)).map(m => m.content)).toEqual(['two', 'three'])
        expect((await log.since('c1', first.seq, 1)).map(m => m.content)).toEqual(['two'])
        expect((await log.since('c1', 0, 0))).toEqual([])
    })

    it('holds an append while other work runs under the same lock', async () => {
        const lock = new KeyedLock()
        const log = new MessageLog(new InMemoryMessages(), lock)
        const order: string[] = []

        let finish = () => {}
        const held = lock.run('c1', () => new Promise<void>(resolve => {
            finish = resolve
        }))
        const appended = log.append('c1', 'user', 'late').then(() => order.push('append'))
        await new Promise(resolve => setTimeout(resolve, 10))
        expect(order).toEqual([])

        finish()
        await Promise.all([held, appended])
        expect(order).toEqual(['append'])
    })
})

describe('fitToBudget', () => {
    it('keeps everything that fits', () => {
        const messages = [message(1, 'aaaa'), message(2, 'bb')]
        expect(fitToBudget(messages, { budgetChars: 100, maxMessageChars: 1000 })).toEqual(messages)
    })

    it('caps each message before counting', () => {
        const [kept] = fitToBudget([message(1, 'x'.repeat(10))], { budgetChars: 100, maxMessageChars: 4 })
        expect(kept.content).toBe(`xxxx${ELLIPSIS}`)
    })

    it('cuts the first overflowing message to the remaining budget and drops anything older', () => {
        const messages = [message(1, 'dddd'), message(2, 'aaaa'), message(3, 'bbbbbb'), message(4, 'cc')]
        const fitted = fitToBudget(messages, { budgetChars: 10, maxMessageChars: 1000 })

        expect(fitted.map(m => m.content)).toEqual([`a${ELLIPSIS}`, 'bbbbbb', 'cc'])
        expect(fitted.map(m => m.seq)).toEqual([2, 3, 4])
    })

    it('drops the overflowing message when only the ellipsis would fit', () => {
        const messages = [message(1, 'an older message'), message(2, 'abcd')]

        expect(fitToBudget(messages, { budgetChars: 4, maxMessageChars: 1000 }).map(m => m.content)).toEqual(['abcd'])
        expect(fitToBudget(messages, { budgetChars: 5, maxMessageChars: 1000 }).map(m => m.content)).toEqual(['abcd'])
    })

    it('never exceeds the budget', () => {
        const messages = [message(1, 'x'.repeat(30)), message(2, 'y'.repeat(30)), message(3, 'z'.repeat(5))]

        for (const budgetChars of [5, 6, 7, 20, 35, 36, 64]) {
            const total = fitToBudget(messages, { budgetChars, maxMessageChars: 1000 })
                .reduce((sum, m) => sum + m.content.length, 0)
            expect(total).toBeLessThanOrEqual(budgetChars)
        }
    })
})
