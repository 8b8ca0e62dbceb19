import type { AppConfig } from '@groundwork/shared'
import { getRedis, getSupabase } from './client'
import { createInMemoryRepositories } from './in-memory'
import { redisMemoryKv } from './redis-memory-kv'
import type { Repositories } from './repositories'
import {
    supabaseChunks,
    supabaseConversations,
    supabaseInteractions,
    supabaseMessages,
    supabaseSummaries,
} from './supabase-repositories'

export function createRepositories(storage: AppConfig['storage']): Repositories {
    if (storage.driver === 'memory') {
        console.warn('[db] STORAGE_DRIVER=memory: conversations and memory are kept in process only')
        return createInMemoryRepositories()
    }

    const supabase = getSupabase(storage.supabaseUrl, storage.supabaseKey)
    return {
        conversations: supabaseConversations(supabase),
        messages: supabaseMessages(supabase),
        memoryKv: redisMemoryKv(getRedis(storage.redisUrl)),
        summaries: supabaseSummaries(supabase),
        chunks: supabaseChunks(supabase),
        interactions: supabaseInteractions(supabase),
    }
}

export { closeClients, getRedis, getSupabase } from './client'
export * from './repositories'
export * from './in-memory'
export { redisMemoryKv } from './redis-memory-kv'
export * from './supabase-repositories'
export { DEFAULT_AGENTS } from './seeds/agents'
