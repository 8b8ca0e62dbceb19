import { createClient, SupabaseClient } from '@supabase/supabase-js'
import { Redis } from 'ioredis'

let supabaseInstance: SupabaseClient | null = null
let redisInstance: Redis | null = null

export const getSupabase = (url: string, key: string): SupabaseClient => {
    if (supabaseInstance) return supabaseInstance
    supabaseInstance = createClient(url, key, {
        auth: { persistSession: false, autoRefreshToken: false },
    })
    return supabaseInstance
}

export const getRedis = (redisUrl: string): Redis => {
    if (redisInstance) return redisInstance
    redisInstance = new Redis(redisUrl, {
        maxRetriesPerRequest: 2,
        retryStrategy: (times) => {
            const delay = Math.min(times * 1000, 10000)
            console.warn(`[Redis] Connection lost. Retrying in ${delay}ms...`)
            return delay
        },
        ...(redisUrl.startsWith('rediss://') ? { tls: {} } : {}),
    })
    return redisInstance
}

export async function closeClients(): Promise<void> {
    if (redisInstance) {
        await redisInstance.quit()
        redisInstance = null
    }
    supabaseInstance = null
}
