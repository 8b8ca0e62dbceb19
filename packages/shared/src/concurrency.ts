import { DeadlineExceededError } from './errors'

/**
 * Runs `fn` over `items` with at most `limit` calls in flight.
 * Results keep the input order; a rejection does not stop the other items.
 */
export async function runBounded<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
    const results: PromiseSettledResult<R>[] = new Array(items.length)
    let next = 0

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++
            try {
                results[index] = { status: 'fulfilled', value: await fn(items[index], index) }
            } catch (reason) {
                results[index] = { status: 'rejected', reason }
            }
        }
    }

    const width = Math.max(1, Math.min(limit, items.length))
    await Promise.all(Array.from({ length: width }, worker))
    return results
}

/**
 * Rejects with DeadlineExceededError when `task` has not settled within
 * `timeoutMs`. The underlying call is not aborted; its result is discarded.
 */
export async function withDeadline<T>(task: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new DeadlineExceededError(label, timeoutMs)), timeoutMs)
    })
    try {
        return await Promise.race([task, timeout])
    } finally {
        clearTimeout(timer)
    }
}

export function normalizeAnswer(text: string): string {
    return text.trim().replace(/\s+/g, ' ')
}
