import { randomUUID } from 'node:crypto'
import type { SupabaseClient } from '@supabase/supabase-js'
import { StoreUnavailableError } from '@groundwork/shared'
import type {
    ChunkRepository,
    ConversationRepository,
    InteractionRepository,
    MessageRepository,
    SummaryRepository,
} from './repositories'
import { ChunkRow, ConversationRow, InteractionRow, MessageRow, SummaryRow } from './rows'

// Tables: conversations, messages, memory_long, interactions.
// Vector search goes through the match_kb_chunks RPC (kb_chunks ⋈ kb_embeddings).

function unavailable(store: string, error: { message: string }): StoreUnavailableError {
    console.error(`[db] ${store} query failed:`, error.message)
    return new StoreUnavailableError(store, error)
}

// ── Conversations ─────────────────────────────────────────────────────────────

export function supabaseConversations(supabase: SupabaseClient): ConversationRepository {
    const find: ConversationRepository['find'] = async (id) => {
        const { data, error } = await supabase
            .from('conversations')
            .select('id, tenant_id, user_id, status')
            .eq('id', id)
            .maybeSingle()
        if (error) throw unavailable('conversations', error)
        return data ? ConversationRow.parse(data) : null
    }

    const ensure: ConversationRepository['ensure'] = async ({ id, tenantId, userId = null }) => {
        const { data, error } = await supabase
            .from('conversations')
            .upsert(
                { id, tenant_id: tenantId, user_id: userId, status: 'active' },
                { onConflict: 'id', ignoreDuplicates: true }
            )
            .select('id, tenant_id, user_id, status')
            .maybeSingle()
        if (error) throw unavailable('conversations', error)
        if (data) return ConversationRow.parse(data)

        // ignoreDuplicates returns nothing for an existing row
        const existing = await find(id)
        if (!existing) throw new StoreUnavailableError('conversations')
        return existing
    }

    return { ensure, find }
}

// ── Messages ──────────────────────────────────────────────────────────────────

const MESSAGE_COLUMNS = 'id, conversation_id, role, content, seq, created_at'

export function supabaseMessages(supabase: SupabaseClient): MessageRepository {
    return {
        async insert({ conversationId, role, content }) {
            // seq is a bigint identity column, so it increases with every insert
            const { data, error } = await supabase
                .from('messages')
                .insert({ id: randomUUID(), conversation_id: conversationId, role, content })
                .select(MESSAGE_COLUMNS)
                .single()
            if (error) throw unavailable('messages', error)
            return MessageRow.parse(data)
        },

        async latest(conversationId, limit) {
            const { data, error } = await supabase
                .from('messages')
                .select(MESSAGE_COLUMNS)
                .eq('conversation_id', conversationId)
                .order('seq', { ascending: false })
                .limit(limit)
            if (error) throw unavailable('messages', error)
            return (data ?? []).map(row => MessageRow.parse(row))
        },

        async after(conversationId, afterSeq, limit) {
            const { data, error } = await supabase
                .from('messages')
                .select(MESSAGE_COLUMNS)
                .eq('conversation_id', conversationId)
                .gt('seq', afterSeq)
                .order('seq', { ascending: true })
                .limit(limit)
            if (error) throw unavailable('messages', error)
            return (data ?? []).map(row => MessageRow.parse(row))
        },
    }
}

// ── Rolling summaries ─────────────────────────────────────────────────────────

const SUMMARY_COLUMNS = 'conversation_id, summary_text, last_message_seq, updated_at'

export function supabaseSummaries(supabase: SupabaseClient): SummaryRepository {
    return {
        async find(conversationId) {
            const { data, error } = await supabase
                .from('memory_long')
                .select(SUMMARY_COLUMNS)
                .eq('conversation_id', conversationId)
                .maybeSingle()
            if (error) throw unavailable('memory_long', error)
            return data ? SummaryRow.parse(data) : null
        },

        async upsert(conversationId, text, lastMessageSeq) {
            const row: { conversation_id: string; summary_text: string; last_message_seq?: number; updated_at: string } = lastMessageSeq === undefined
                ? { conversation_id: conversationId, summary_text: text, updated_at: new Date().toISOString() }
                : { conversation_id: conversationId, summary_text: text, last_message_seq: lastMessageSeq, updated_at: new Date().toISOString() }
            const { data, error } = await supabase
                .from('memory_long')
                .upsert(row, { onConflict: 'conversation_id' })
                .select(SUMMARY_COLUMNS)
                .single()
            if (error) throw unavailable('memory_long', error)
            return SummaryRow.parse(data)
        },
    }
}

// ── Knowledge-base chunks ─────────────────────────────────────────────────────

export function supabaseChunks(supabase: SupabaseClient): ChunkRepository {
    return {
        async match({ tenantId, embedding, k, docIds, tags }) {
            const { data, error } = await supabase.rpc('match_kb_chunks', {
                query_embedding: embedding,
                tenant_filter: tenantId,
                match_count: k,
                doc_ids: docIds ?? null,
                tag_filter: tags ?? null,
            })
            if (error) throw unavailable('kb_chunks', error)
            const rows: unknown[] = Array.isArray(data) ? data : []
            return rows.map(row => ChunkRow.parse(row))
        },
    }
}

// ── Interactions ──────────────────────────────────────────────────────────────

export function supabaseInteractions(supabase: SupabaseClient): InteractionRepository {
    return {
        async insert(event) {
            const { error } = await supabase.from('interactions').insert({
                tenant_id: event.tenantId,
                route: event.route,
                model_id: event.modelId,
                latency_ms: event.latencyMs,
                tokens_in: event.tokensIn,
                tokens_out: event.tokensOut,
                cost_est: event.costEst,
                params_json: event.params ?? null,
                created_at: event.createdAt.toISOString(),
            })
            if (error) throw unavailable('interactions', error)
        },

        async recent(tenantId, limit) {
            const { data, error } = await supabase
                .from('interactions')
                .select('tenant_id, route, model_id, latency_ms, tokens_in, tokens_out, cost_est, params_json, created_at')
                .eq('tenant_id', tenantId)
                .order('created_at', { ascending: false })
                .limit(limit)
            if (error) throw unavailable('interactions', error)
            return (data ?? []).map(row => InteractionRow.parse(row))
        },
    }
}
