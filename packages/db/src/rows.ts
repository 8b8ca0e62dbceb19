import { z } from 'zod'
import type {
    Conversation,
    InteractionEvent,
    Message,
    RollingSummary,
} from '@groundwork/shared'
import type { ChunkMatch } from './repositories'

// Row shapes as PostgREST returns them. Decoded here so nothing untyped
// leaves the repository layer.

const timestamp = z.union([z.string(), z.date()]).transform((v) => new Date(v))

export const ConversationRow = z
    .object({
        id: z.string(),
        tenant_id: z.string(),
        user_id: z.string().nullable().optional(),
        status: z.enum(['active', 'archived']),
    })
    .transform((r): Conversation => ({
        id: r.id,
        tenantId: r.tenant_id,
        userId: r.user_id ?? null,
        status: r.status,
    }))

export const MessageRow = z
    .object({
        id: z.string(),
        conversation_id: z.string(),
        role: z.enum(['user', 'assistant', 'system']),
        content: z.string().nullable(),
        seq: z.coerce.number(),
        created_at: timestamp,
    })
    .transform((r): Message => ({
        id: r.id,
        conversationId: r.conversation_id,
        role: r.role,
        content: r.content ?? '',
        seq: r.seq,
        createdAt: r.created_at,
    }))

export const SummaryRow = z
    .object({
        conversation_id: z.string(),
        summary_text: z.string().nullable(),
        last_message_seq: z.coerce.number().nullable().optional(),
        updated_at: timestamp,
    })
    .transform((r): RollingSummary => ({
        conversationId: r.conversation_id,
        text: r.summary_text ?? '',
        lastMessageSeq: r.last_message_seq ?? 0,
        updatedAt: r.updated_at,
    }))

export const ChunkRow = z
    .object({
        chunk_id: z.union([z.string(), z.number()]).transform(String),
        doc_id: z.string(),
        title: z.string().nullable().optional(),
        uri: z.string().nullable().optional(),
        text: z.string(),
        tenant_id: z.string(),
        distance: z.coerce.number(),
    })
    .transform((r): ChunkMatch => ({
        chunkId: r.chunk_id,
        docId: r.doc_id,
        title: r.title ?? null,
        uri: r.uri ?? null,
        text: r.text,
        tenantId: r.tenant_id,
        distance: r.distance,
    }))

export const InteractionRow = z
    .object({
        tenant_id: z.string(),
        route: z.string(),
        model_id: z.string(),
        latency_ms: z.coerce.number().nullable(),
        tokens_in: z.coerce.number().nullable(),
        tokens_out: z.coerce.number().nullable(),
        cost_est: z.coerce.number().nullable(),
        params_json: z.record(z.unknown()).nullable().optional(),
        created_at: timestamp,
    })
    .transform((r): InteractionEvent => ({
        tenantId: r.tenant_id,
        route: r.route,
        modelId: r.model_id,
        latencyMs: r.latency_ms ?? 0,
        tokensIn: r.tokens_in ?? 0,
        tokensOut: r.tokens_out ?? 0,
        costEst: r.cost_est ?? 0,
        params: r.params_json ?? undefined,
        createdAt: r.created_at,
    }))
