import cron from 'node-cron'
import { errorMessage } from '@groundwork/shared'
import type { MemoryStore } from './memory-store'

export interface KvSweeper {
    /** Runs one sweep now; resolves with the number of purged entries (0 on failure). */
    runOnce(): Promise<number>
    stop(): void
}

/**
 * Schedules MemoryStore.sweepExpired on a cron expression (every 15 minutes
 * by default). Overlapping ticks are skipped while a sweep is in flight.
 */
export function startKvSweeper(memory: MemoryStore, expression = '*/15 * * * *'): KvSweeper {
    if (!cron.validate(expression)) {
        throw new Error(`Invalid KV sweep cron expression: "${expression}"`)
    }

    let running: Promise<number> | null = null

    const runOnce = (): Promise<number> => {
        if (running) return running
        running = memory
            .sweepExpired(new Date())
            .then((removed) => {
                if (removed > 0) console.log(`[memory] memory_kv cleanup removed ${removed} expired entries`)
                return removed
            })
            .catch((err: unknown) => {
                console.warn('[memory] memory_kv cleanup failed:', errorMessage(err))
                return 0
            })
            .finally(() => {
                running = null
            })
        return running
    }

    const task = cron.schedule(expression, () => {
        void runOnce()
    })

    return {
        runOnce,
        stop: () => task.stop(),
    }
}
