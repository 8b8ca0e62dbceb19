import { z } from 'zod'

// Models wrap JSON in prose or code fences often enough that we look for the
// outermost object instead of parsing the whole reply.
export function extractJson(text: string): unknown {
    const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/)
    const body = (fenced ? fenced[1] : text).trim()
    const start = body.indexOf('{')
    const end = body.lastIndexOf('}')
    if (start < 0 || end <= start) return undefined
    try {
        return JSON.parse(body.slice(start, end + 1))
    } catch {
        return undefined
    }
}

const Confidence = z.coerce.number().catch(0).transform(c => Math.min(1, Math.max(0, c)))

export const ReasonerOutputSchema = z.object({
    reasoning: z.array(z.string()).catch([]),
    answer: z.string().trim().min(1),
    confidence: Confidence,
})
export type ReasonerOutput = z.infer<typeof ReasonerOutputSchema>

/** Falls back to the raw reply, with zero confidence, when it is not the JSON we asked for. */
export function parseReasonerOutput(text: string): ReasonerOutput {
    const parsed = ReasonerOutputSchema.safeParse(extractJson(text))
    if (parsed.success) return parsed.data
    return { reasoning: [], answer: text.trim(), confidence: 0 }
}

export const ReactTurnSchema = z.object({
    thought: z.string().catch(''),
    action: z.enum(['search', 'finish']),
    input: z.string().trim(),
})
export type ReactTurn = z.infer<typeof ReactTurnSchema>

export const DecompositionSchema = z.object({
    subQuestions: z.array(z.string().trim().min(1)).min(1).max(5),
})

export const CritiqueSchema = z.object({
    approved: z.boolean(),
    critique: z.string().catch(''),
})

/** "Step 1: ..." / "1. ..." / "- ..." lines; anything else is ignored. */
export function parsePlan(text: string): string[] {
    const steps: string[] = []
    for (const raw of text.split('\n')) {
        const line = raw.trim()
        const match = line.match(/^(?:step\s*\d+\s*[:.\-)]|\d+[.)]|[-*•])\s*(.+)$/i)
        if (match && match[1].trim()) steps.push(match[1].trim())
    }
    return steps
}
