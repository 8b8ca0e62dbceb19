import { describe, expect, it } from 'vitest'
import { DeadlineExceededError, KeyedLock, normalizeAnswer, runBounded, withDeadline } from '../src'

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

describe('runBounded', () => {
    it('never runs more than the limit at once and keeps input order', async () => {
        let active = 0
        let peak = 0
        const results = await runBounded([30, 10, 20, 5], 2, async (ms, i) => {
            active++
            peak = Math.max(peak, active)
            await delay(ms)
            active--
            return i
        })

        expect(peak).toBe(2)
        expect(results.map(r => (r.status === 'fulfilled' ? r.value : -1))).toEqual([0, 1, 2, 3])
    })

    it('reports rejections without stopping the other items', async () => {
        const results = await runBounded([1, 2, 3], 3, async n => {
            if (n === 2) throw new Error('boom')
            return n * 10
        })

        expect(results[0]).toEqual({ status: 'fulfilled', value: 10 })
        expect(results[1].status).toBe('rejected')
        expect(results[2]).toEqual({ status: 'fulfilled', value: 30 })
    })
})

describe('withDeadline', () => {
    it('resolves when the task beats the deadline', async () => {
        await expect(withDeadline(Promise.resolve('ok'), 50, 'fast')).resolves.toBe('ok')
    })

    it('rejects with DeadlineExceededError when the task is too slow', async () => {
        const slow = delay(200).then(() => 'late')
        const pending = withDeadline(slow, 10, 'planner call')

        await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError)
        await expect(pending).rejects.toThrow('planner call timed out after 10ms')
    })
})

describe('KeyedLock', () => {
    it('serializes work under one key in submission order', async () => {
        const lock = new KeyedLock()
        const order: string[] = []

        await Promise.all([
            lock.run('c1', async () => {
                await delay(20)
                order.push('first')
            }),
            lock.run('c1', async () => {
                order.push('second')
            }),
        ])

        expect(order).toEqual(['first', 'second'])
    })

    it('runs different keys in parallel', async () => {
        const lock = new KeyedLock()
        const order: string[] = []

        await Promise.all([
            lock.run('a', async () => {
                await delay(20)
                order.push('a')
            }),
            lock.run('b', async () => {
                order.push('b')
            }),
        ])

        expect(order).toEqual(['b', 'a'])
    })

    it('keeps the queue moving after a rejected task and cleans up idle keys', async () => {
        const lock = new KeyedLock()

        await expect(lock.run('k', () => Promise.reject(new Error('fail')))).rejects.toThrow('fail')
        await expect(lock.run('k', () => 'next')).resolves.toBe('next')
        await delay(0)

        expect(lock.isLocked('k')).toBe(false)
        expect(lock.size).toBe(0)
    })
})

describe('normalizeAnswer', () => {
    it('trims and collapses whitespace', () => {
        expect(normalizeAnswer('  Paris \n is   the\tcapital ')).toBe('Paris is the capital')
    })
})
