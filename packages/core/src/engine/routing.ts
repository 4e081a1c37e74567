// packages/core/src/engine/routing.ts

import { latestQualityResult } from '../state/workflow-state.js';
import type { PrimaryPath, StageName, WorkflowState } from '../types/workflow.js';

export type RouteEdge =
  | 'recipe_generation'
  | 'knowledge_response'
  | 'general_response'
  | 'image_generation'
  | 'error_handling';

export type QualityEdge = 'regenerate' | 'format_output' | 'error';

function edgeForPath(path: PrimaryPath): RouteEdge {
  switch (path) {
    case 'recipe_generation':
      return 'recipe_generation';
    case 'knowledge_response':
    case 'ingredient_analysis':
    case 'pairing_analysis':
      return 'knowledge_response';
    case 'image_generation':
      return 'image_generation';
    case 'general_response':
      return 'general_response';
    default: {
      const unreachable: never = path;
      throw new Error(`Unknown primary path: ${String(unreachable)}`);
    }
  }
}

/** Edge taken after the content router. Reads the state, never writes it. */
export function routeAfterContentRouter(state: WorkflowState): RouteEdge {
  if (state.currentStage === 'error' || state.routing === null) {
    return 'error_handling';
  }
  return edgeForPath(state.routing.primaryPath);
}

/**
 * Edge taken after quality validation. `regenerate` only while attempts
 * remain, so the loop runs at most maxRegenerationAttempts + 1 times.
 */
export function qualityGate(state: WorkflowState): QualityEdge {
  if (state.currentStage === 'error') {
    return 'error';
  }
  if (!state.flags?.qualityGateRequired) {
    return 'format_output';
  }
  const latest = latestQualityResult(state);
  if (
    latest !== null &&
    !latest.passed &&
    state.regenerationCount < state.settings.maxRegenerationAttempts
  ) {
    return 'regenerate';
  }
  return 'format_output';
}

export function routeTarget(edge: RouteEdge): StageName {
  switch (edge) {
    case 'recipe_generation':
    case 'knowledge_response':
    case 'general_response':
    case 'image_generation':
      return 'response_generator';
    case 'error_handling':
      return 'output_formatter';
    default: {
      const unreachable: never = edge;
      throw new Error(`Unknown route edge: ${String(unreachable)}`);
    }
  }
}

export function qualityTarget(edge: QualityEdge): StageName {
  switch (edge) {
    case 'regenerate':
      return 'response_generator';
    case 'format_output':
    case 'error':
      return 'output_formatter';
    default: {
      const unreachable: never = edge;
      throw new Error(`Unknown quality edge: ${String(unreachable)}`);
    }
  }
}
