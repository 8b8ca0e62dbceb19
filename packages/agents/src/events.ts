import { errorMessage } from '@groundwork/shared'
import type { AgentType, LogSeverity, OrchestrationLog } from '@groundwork/shared'

export type OrchestrationLogListener = (entry: OrchestrationLog) => void

/**
 * Rolling log of orchestration events for the inspection surface. Keeps the
 * newest `capacity` entries; older ones fall off.
 */
export class OrchestrationEventLog {
    private readonly entries: OrchestrationLog[] = []
    private readonly listeners = new Set<OrchestrationLogListener>()
    private nextId = 1

    constructor(private readonly capacity = 200) {}

    add(
        severity: LogSeverity,
        message: string,
        context: { agentType?: AgentType; conversationId?: string } = {}
    ): OrchestrationLog {
        const entry: OrchestrationLog = {
            id: this.nextId++,
            timestamp: Date.now(),
            severity,
            message,
            ...context,
        }
        this.entries.push(entry)
        if (this.entries.length > this.capacity) this.entries.splice(0, this.entries.length - this.capacity)

        for (const listener of this.listeners) {
            try {
                listener(entry)
            } catch (err) {
                console.warn('[orchestrator] log listener failed:', errorMessage(err))
            }
        }
        return entry
    }

    /** Newest last. */
    recent(limit = this.capacity): OrchestrationLog[] {
        if (limit <= 0) return []
        return this.entries.slice(-limit)
    }

    subscribe(listener: OrchestrationLogListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }
}
