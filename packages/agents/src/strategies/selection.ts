import { normalizeAnswer } from '@groundwork/shared'
import type { Candidate } from './types'

/**
 * Most frequent key wins; on a tie the group seen first wins. Groups keep
 * first-seen order, so only a strictly larger count replaces the leader.
 */
export function majorityVote<T>(items: readonly T[], key: (item: T) => string): T {
    if (items.length === 0) throw new Error('majorityVote needs at least one item')

    const groups = new Map<string, { first: T; count: number }>()
    for (const item of items) {
        const k = key(item)
        const group = groups.get(k)
        if (group) group.count++
        else groups.set(k, { first: item, count: 1 })
    }

    let best: { first: T; count: number } | null = null
    for (const group of groups.values()) {
        if (!best || group.count > best.count) best = group
    }
    return best ? best.first : items[0]
}

export function voteOnAnswer(candidates: readonly Candidate[]): Candidate {
    const ordered = [...candidates].sort((a, b) => a.order - b.order)
    return majorityVote(ordered, c => normalizeAnswer(c.answer))
}

// Highest confidence; the lowest submission index breaks ties
export function mostConfident(candidates: readonly Candidate[]): Candidate {
    if (candidates.length === 0) throw new Error('mostConfident needs at least one candidate')
    return candidates.reduce((best, c) =>
        c.confidence > best.confidence || (c.confidence === best.confidence && c.order < best.order) ? c : best
    )
}

export function firstCandidate(candidates: readonly Candidate[]): Candidate {
    const [first] = candidates
    if (!first) throw new Error('strategy produced no candidate')
    return first
}

/** Fulfilled values in input order; rethrows the first failure when nothing succeeded. */
export function settledValues<T>(results: PromiseSettledResult<T>[]): T[] {
    const values: T[] = []
    let firstError: unknown = null
    for (const result of results) {
        if (result.status === 'fulfilled') values.push(result.value)
        else if (firstError === null) firstError = result.reason
    }
    if (values.length === 0 && firstError !== null) throw firstError
    return values
}
