import type { InteractionRepository } from '@groundwork/db'
import { errorMessage } from '@groundwork/shared'
import type { Generation, InteractionEvent } from '@groundwork/shared'

/**
 * Fire-and-forget interaction log. `record` returns immediately; a failed
 * write is logged here and never reaches the request that produced it.
 */
export class TelemetryRecorder {
    private readonly inFlight = new Set<Promise<void>>()

    constructor(private readonly interactions: InteractionRepository) {}

    record(event: InteractionEvent): void {
        const write = this.interactions
            .insert(event)
            .catch((err: unknown) => {
                console.warn(`[telemetry] interaction write failed (route=${event.route}):`, errorMessage(err))
            })
            .finally(() => {
                this.inFlight.delete(write)
            })
        this.inFlight.add(write)
    }

    /** Waits for writes already started. Used on shutdown and in tests. */
    async flush(): Promise<void> {
        await Promise.all([...this.inFlight])
    }

    get pending(): number {
        return this.inFlight.size
    }
}

// Folds every generation of one request into a single usage line
export class UsageMeter {
    inputTokens = 0
    outputTokens = 0
    cost = 0

    add(generation: Pick<Generation, 'inputTokens' | 'outputTokens' | 'cost'>): void {
        this.inputTokens += generation.inputTokens
        this.outputTokens += generation.outputTokens
        this.cost += generation.cost
    }
}
