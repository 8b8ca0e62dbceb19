import { DEFAULT_AGENTS } from '@groundwork/db'
import { AgentUnavailableError, KeyedLock, errorMessage } from '@groundwork/shared'
import type { Agent, AgentStatus, AgentType } from '@groundwork/shared'

/**
 * Who is changing the status. The orchestrator only moves agents between
 * available and busy; only an external health signal takes an agent offline
 * or brings it back.
 */
export type StatusSource = 'orchestrator' | 'health'

export type AgentStatusListener = (agent: Agent) => void

export class InvalidTransitionError extends Error {
    constructor(agentId: string, from: AgentStatus, to: AgentStatus, source: StatusSource) {
        super(`${source} cannot move ${agentId} from ${from} to ${to}`)
        this.name = 'InvalidTransitionError'
    }
}

export class AgentRegistry {
    private readonly agents = new Map<string, Agent>()
    private readonly lock = new KeyedLock()     // one queue per agent id
    private readonly waiters = new Map<AgentType, Set<() => void>>()
    private readonly releases = new Map<AgentType, number>()   // bumps on every return to available
    private readonly listeners = new Set<AgentStatusListener>()

    constructor(seed: readonly Agent[] = DEFAULT_AGENTS) {
        for (const agent of seed) {
            this.agents.set(agent.id, { ...agent, capabilities: [...agent.capabilities] })
        }
    }

    list(): Agent[] {
        return [...this.agents.values()].map(a => ({ ...a }))
    }

    get(agentId: string): Agent | null {
        const agent = this.agents.get(agentId)
        return agent ? { ...agent } : null
    }

    findAvailable(type: AgentType): Agent | null {
        return this.find(type, 'available')
    }

    findBusy(type: AgentType): Agent | null {
        return this.find(type, 'busy')
    }

    /** The only mutator. Serialized per agent id. */
    setStatus(agentId: string, status: AgentStatus, source: StatusSource = 'orchestrator'): Promise<Agent> {
        return this.lock.run(agentId, () => this.transition(agentId, status, source))
    }

    /**
     * Claims an available agent of `type`, marking it busy. When every agent
     * of the type is busy, waits for a release until `deadlineMs` runs out.
     */
    async acquire(type: AgentType, { deadlineMs }: { deadlineMs: number }): Promise<Agent> {
        const deadline = Date.now() + deadlineMs

        for (;;) {
            const seen = this.releases.get(type) ?? 0
            const candidates = [...this.agents.values()].filter(a => a.type === type)
            if (candidates.every(a => a.status === 'offline')) {
                throw new AgentUnavailableError(type, candidates.length === 0 ? 'none registered' : 'all offline')
            }

            for (const candidate of candidates) {
                const claimed = await this.lock.run(candidate.id, () =>
                    this.agents.get(candidate.id)?.status === 'available'
                        ? this.transition(candidate.id, 'busy', 'orchestrator')
                        : null
                )
                if (claimed) return claimed
            }

            const remaining = deadline - Date.now()
            // An agent freed up while we were scanning; look again before sleeping
            if (remaining > 0 && (this.releases.get(type) ?? 0) !== seen) continue
            if (remaining <= 0 || !(await this.waitForRelease(type, remaining))) {
                throw new AgentUnavailableError(type, `all busy for ${deadlineMs}ms`)
            }
        }
    }

    /** Returns a busy agent to available. An agent taken offline meanwhile stays offline. */
    release(agentId: string): Promise<Agent | null> {
        return this.lock.run(agentId, () => {
            const agent = this.agents.get(agentId)
            if (!agent || agent.status !== 'busy') return agent ? { ...agent } : null
            return this.transition(agentId, 'available', 'orchestrator')
        })
    }

    subscribe(listener: AgentStatusListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    private find(type: AgentType, status: AgentStatus): Agent | null {
        for (const agent of this.agents.values()) {
            if (agent.type === type && agent.status === status) return { ...agent }
        }
        return null
    }

    private transition(agentId: string, status: AgentStatus, source: StatusSource): Agent {
        const agent = this.agents.get(agentId)
        if (!agent) throw new Error(`Unknown agent ${agentId}`)

        if (source === 'orchestrator' && (status === 'offline' || agent.status === 'offline')) {
            throw new InvalidTransitionError(agentId, agent.status, status, source)
        }
        if (agent.status === status) return { ...agent }

        agent.status = status
        const snapshot = { ...agent }
        for (const listener of this.listeners) {
            try {
                listener(snapshot)
            } catch (err) {
                console.warn('[registry] status listener failed:', errorMessage(err))
            }
        }
        if (status === 'available') {
            this.releases.set(agent.type, (this.releases.get(agent.type) ?? 0) + 1)
            this.wakeOne(agent.type)
        }
        return snapshot
    }

    private waitForRelease(type: AgentType, timeoutMs: number): Promise<boolean> {
        return new Promise(resolve => {
            const waiters = this.waiters.get(type) ?? new Set<() => void>()
            this.waiters.set(type, waiters)

            const wake = () => {
                clearTimeout(timer)
                waiters.delete(wake)
                resolve(true)
            }
            const timer = setTimeout(() => {
                waiters.delete(wake)
                resolve(false)
            }, timeoutMs)
            waiters.add(wake)
        })
    }

    private wakeOne(type: AgentType): void {
        const waiters = this.waiters.get(type)
        const next = waiters?.values().next()
        if (next && !next.done) next.value()
    }
}
