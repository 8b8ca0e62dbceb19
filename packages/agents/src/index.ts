export { ModelRouter, calculateCost } from './lib/model-router'
export type { ModelRouterOptions } from './lib/model-router'
export { TelemetryRecorder, UsageMeter } from './lib/telemetry'
export { OrchestrationEventLog } from './events'
export type { OrchestrationLogListener } from './events'
export { AgentRegistry, InvalidTransitionError } from './registry'
export type { AgentStatusListener, StatusSource } from './registry'
export { Orchestrator, PIPELINE, citedSources } from './orchestrator'
export type { OrchestrationRequest, OrchestrationResult, OrchestratorDeps, OrchestratorSettings } from './orchestrator'
export { formatReasoningResponse } from './format'
export type { ReasoningDisplay } from './format'
export * from './strategies'
