export * from './types'
export * from './schemas'
export * from './errors'
export { loadConfig } from './config'
export type { AppConfig } from './config'
export { KeyedLock } from './keyed-lock'
export { runBounded, withDeadline, normalizeAnswer } from './concurrency'
