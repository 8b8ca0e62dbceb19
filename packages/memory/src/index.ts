// Everything the rest of the system needs — single import point
export { MemoryStore } from './memory-store'
export type { MemoryStoreOptions } from './memory-store'
export { MessageLog, fitToBudget, ELLIPSIS } from './message-log'
export type { TranscriptBudget } from './message-log'
export { OpenAIEmbedder, decodeEmbedding } from './embeddings'
export { RetrievalEngine, compareChunks } from './retrieval'
export type { RetrievalOptions, RetrievalOutcome } from './retrieval'
export { buildPrompt, citationSource, GROUNDED_SYSTEM_PROMPT, NO_SUMMARY } from './context-builder'
export { RollingSummarizer, buildSummaryPrompt } from './summarizer'
export { startKvSweeper } from './sweeper'
export type { KvSweeper } from './sweeper'
