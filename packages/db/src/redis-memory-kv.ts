import type { Redis } from 'ioredis'
import { z } from 'zod'
import { JsonValueSchema, StoreUnavailableError } from '@groundwork/shared'
import type { MemoryEntry } from '@groundwork/shared'
import type { MemoryKvRepository } from './repositories'

// One string per entry at kv:<conversation>:<key>, plus a sorted set of entry
// keys scored by expiry (ms) that the sweep walks.
const EXPIRY_INDEX = 'kv:expiry'
const KEY = (conversationId: string, key: string) =>
    `kv:${encodeURIComponent(conversationId)}:${encodeURIComponent(key)}`

// Delete and unindex atomically so a concurrent set() with a fresh expiry is
// either fully before or fully after the sweep.
const SWEEP_SCRIPT = `
local ids = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
for _, id in ipairs(ids) do
    redis.call('DEL', id)
    redis.call('ZREM', KEYS[1], id)
end
return #ids
`

const StoredEntry = z.object({
    conversationId: z.string(),
    key: z.string(),
    value: JsonValueSchema,
    expiresAt: z.number().nullable(),
})

export function redisMemoryKv(redis: Redis): MemoryKvRepository {
    const guard = async <T>(op: () => Promise<T>): Promise<T> => {
        try {
            return await op()
        } catch (err) {
            console.error('[db] memory_kv redis call failed:', err instanceof Error ? err.message : err)
            throw new StoreUnavailableError('memory_kv', err)
        }
    }

    return {
        upsert: (entry) => guard(async () => {
            const id = KEY(entry.conversationId, entry.key)
            const expiresAt = entry.expiresAt?.getTime() ?? null
            const payload = JSON.stringify({
                conversationId: entry.conversationId,
                key: entry.key,
                value: entry.value,
                expiresAt,
            })
            const tx = redis.multi()
            if (expiresAt === null) {
                tx.set(id, payload)
                tx.zrem(EXPIRY_INDEX, id)
            } else {
                // Redis drops the key itself at expiry; the index drives the sweep count
                tx.set(id, payload, 'PXAT', expiresAt)
                tx.zadd(EXPIRY_INDEX, expiresAt, id)
            }
            await tx.exec()
        }),

        find: (conversationId, key) => guard(async () => {
            const raw = await redis.get(KEY(conversationId, key))
            if (raw === null) return null
            const stored = StoredEntry.parse(JSON.parse(raw))
            const entry: MemoryEntry = {
                conversationId: stored.conversationId,
                key: stored.key,
                value: stored.value,
                expiresAt: stored.expiresAt === null ? null : new Date(stored.expiresAt),
            }
            return entry
        }),

        remove: (conversationId, key) => guard(async () => {
            const id = KEY(conversationId, key)
            await redis.multi().del(id).zrem(EXPIRY_INDEX, id).exec()
        }),

        removeExpired: (now) => guard(async () => {
            const removed = await redis.eval(SWEEP_SCRIPT, 1, EXPIRY_INDEX, String(now.getTime()))
            return Number(removed)
        }),
    }
}
