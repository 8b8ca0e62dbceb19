import { GroundworkError } from '@groundwork/shared'
import type { ErrorCode } from '@groundwork/shared'

const STATUS: Record<ErrorCode, number> = {
    invalid_input: 400,
    provider_error: 502,
    embedding_unavailable: 502,
    step_failure: 502,
    deadline_exceeded: 504,
    store_unavailable: 503,
    agent_unavailable: 503,
}

export function statusFor(err: unknown): number {
    return err instanceof GroundworkError ? STATUS[err.code] : 500
}

// Our own errors carry short, caller-safe messages; anything else stays in the log
export function publicMessage(err: unknown): string {
    return err instanceof GroundworkError ? err.message : 'Internal server error'
}
