// packages/core/src/engine -- stage graph, routing and the orchestrator

export { EventBus } from './event-bus.js';
export { Orchestrator } from './orchestrator.js';
export type { HistoryEntry, OrchestratorOptions } from './orchestrator.js';
export { createPipeline } from './pipeline.js';
export type { CreatePipelineOptions } from './pipeline.js';
export { ENTRY_STAGE, WorkflowGraph } from './workflow-graph.js';
export type { StageMap } from './workflow-graph.js';
export { qualityGate, qualityTarget, routeAfterContentRouter, routeTarget } from './routing.js';
export type { QualityEdge, RouteEdge } from './routing.js';
