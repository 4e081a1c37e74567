// packages/core/src/types/events.ts

/**
 * Events emitted while a message moves through the pipeline.
 * Type names are dot-separated.
 */

import type { QualityEdge, RouteEdge } from '../engine/routing.js';
import type { StageName, WorkflowStage } from './workflow.js';

// -- Lifecycle events --
export interface SessionStartedEvent {
  type: 'session.started';
  sessionId: string;
  runId: string;
  input: string;
  timestamp: string;
}

export interface SessionCompletedEvent {
  type: 'session.completed';
  sessionId: string;
  runId: string;
  success: boolean;
  degraded: boolean;
  durationMs: number;
  timestamp: string;
}

export interface SessionFailedEvent {
  type: 'session.failed';
  sessionId: string;
  runId: string | null;
  error: string;
  lastStage: WorkflowStage | null;
  timestamp: string;
}

// -- Stage events --
export interface StageStartedEvent {
  type: 'stage.started';
  runId: string;
  stage: StageName;
  timestamp: string;
}

export interface StageCompletedEvent {
  type: 'stage.completed';
  runId: string;
  stage: StageName;
  durationMs: number;
  timestamp: string;
}

export interface StageFailedEvent {
  type: 'stage.failed';
  runId: string;
  stage: StageName;
  error: string;
  recoverable: boolean;
  timestamp: string;
}

// -- Decision events --
export interface RouteSelectedEvent {
  type: 'route.selected';
  runId: string;
  edge: RouteEdge;
  timestamp: string;
}

export interface QualityGateEvent {
  type: 'quality.gate';
  runId: string;
  edge: QualityEdge;
  score: number | null;
  regenerationCount: number;
  maxAttempts: number;
  timestamp: string;
}

export type EngineEvent =
  | SessionStartedEvent
  | SessionCompletedEvent
  | SessionFailedEvent
  | StageStartedEvent
  | StageCompletedEvent
  | StageFailedEvent
  | RouteSelectedEvent
  | QualityGateEvent;
