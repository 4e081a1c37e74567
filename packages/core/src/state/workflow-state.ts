// packages/core/src/state/workflow-state.ts

import type { PipelineConfig } from '../types/config.js';
import type { PersonaState } from '../types/persona.js';
import type { ConversationContext } from '../types/session.js';
import type {
  DebugSummary,
  FormatPreferences,
  ProcessingErrorRecord,
  QualityCheckResult,
  RunSettings,
  StageExecutionRecord,
  WorkflowStage,
  WorkflowState,
} from '../types/workflow.js';
import { ValidationError, WorkflowError } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import { clonePersonaState, createPersonaState, restorePersonaState } from './persona-state.js';

/** Legal moves of the stage state machine. Any stage may also enter `error`. */
export const STAGE_TRANSITIONS: Record<WorkflowStage, readonly WorkflowStage[]> = {
  input_received: ['classified'],
  classified: ['persona_applied'],
  persona_applied: ['processing'],
  processing: ['generated'],
  generated: ['quality_checked'],
  quality_checked: ['processing', 'completed'],
  error: ['completed'],
  completed: [],
};

export interface CreateStateParams {
  sessionId: string;
  userInput: string;
  config: PipelineConfig;
  formatPreferences?: FormatPreferences;
  conversation?: ConversationContext;
  /** Persona carried over from a previous turn; otherwise built from config. */
  persona?: PersonaState;
}

function snapshotSettings(config: PipelineConfig): RunSettings {
  return Object.freeze({
    features: Object.freeze({ ...config.features }),
    qualityThreshold: config.quality.threshold,
    weights: Object.freeze({ ...config.quality.weights }),
    maxRegenerationAttempts: config.quality.maxRegenerationAttempts,
    motifThreshold: config.quality.motifThreshold,
    includeSignature: config.output.includeSignature,
    signature: config.output.signature,
    historyLimit: config.session.historyLimit,
  });
}

/**
 * Build the record for one incoming message.
 * Throws ValidationError on an empty or oversized message or a bad session id.
 */
export function createWorkflowState(params: CreateStateParams): WorkflowState {
  const { config } = params;
  if (params.sessionId.trim() === '') {
    throw new ValidationError('sessionId must not be empty', 'sessionId');
  }
  if (params.userInput.trim() === '') {
    throw new ValidationError('Message must not be empty', 'userInput');
  }
  if (params.userInput.length > config.limits.maxInputLength) {
    throw new ValidationError(
      `Message is ${params.userInput.length} characters; the limit is ${config.limits.maxInputLength}`,
      'userInput',
    );
  }

  const formatPreferences = { ...params.formatPreferences };
  const persona = params.persona
    ? restorePersonaState(params.persona, config.persona)
    : createPersonaState(config.persona, formatPreferences.platform);
  if (formatPreferences.platform) {
    persona.context.platform = formatPreferences.platform;
  }

  return {
    sessionId: params.sessionId,
    runId: generateRunId(),
    rawInput: params.userInput,
    settings: snapshotSettings(config),
    startedAt: Date.now(),
    currentStage: 'input_received',
    stagePath: ['input_received'],
    complete: false,
    regenerationCount: 0,
    normalizedInput: null,
    classification: null,
    persona,
    personaResponse: null,
    routing: null,
    flags: null,
    knowledge: [],
    generation: null,
    qualityResults: [],
    qualityPassed: false,
    executions: [],
    errors: [],
    lastError: null,
    finalOutput: null,
    outputMetadata: null,
    formatPreferences,
    conversation: params.conversation ?? {
      history: [],
      preferences: {
        dietaryRestrictions: [],
        skillLevel: 'intermediate',
        ingredientAffinities: {},
        favoriteCuisines: [],
      },
    },
    completedAt: null,
  };
}

/**
 * Move to the next stage. Once in `error` the state stays there until
 * completion, so downstream decisions still observe the failure.
 */
export function advanceStage(state: WorkflowState, next: WorkflowStage): void {
  assertOpen(state);
  if (state.currentStage === 'error') {
    return;
  }
  if (next !== 'error' && !STAGE_TRANSITIONS[state.currentStage].includes(next)) {
    throw new WorkflowError(`Illegal stage transition ${state.currentStage} -> ${next}`, next);
  }
  state.currentStage = next;
  state.stagePath.push(next);
}

export function recordError(state: WorkflowState, error: ProcessingErrorRecord): void {
  assertOpen(state);
  state.errors.push(error);
  state.lastError = error;
  if (state.currentStage !== 'error') {
    state.currentStage = 'error';
    state.stagePath.push('error');
  }
}

export function recordExecution(state: WorkflowState, record: StageExecutionRecord): void {
  assertOpen(state);
  state.executions.push(record);
}

export function addQualityResult(state: WorkflowState, result: QualityCheckResult): void {
  assertOpen(state);
  state.qualityResults.push(result);
  state.qualityPassed = result.passed;
}

export function latestQualityResult(state: WorkflowState): QualityCheckResult | null {
  return state.qualityResults.at(-1) ?? null;
}

/** Apply the `regenerate` edge: bump the counter and go back to `processing`. */
export function incrementRegeneration(state: WorkflowState): void {
  if (state.regenerationCount >= state.settings.maxRegenerationAttempts) {
    throw new WorkflowError(
      `Regeneration limit of ${state.settings.maxRegenerationAttempts} already reached`,
      'quality_validator',
    );
  }
  advanceStage(state, 'processing');
  state.regenerationCount += 1;
}

export function isRegenerationNeeded(state: WorkflowState): boolean {
  const latest = latestQualityResult(state);
  return (
    latest !== null &&
    !latest.passed &&
    state.regenerationCount < state.settings.maxRegenerationAttempts
  );
}

export function getPersonaState(state: WorkflowState): PersonaState {
  return clonePersonaState(state.persona);
}

export function setPersonaState(state: WorkflowState, persona: PersonaState): void {
  assertOpen(state);
  state.persona = clonePersonaState(persona);
}

/** Text to show the user. Non-empty by the time completion is allowed. */
export function setFinalOutput(state: WorkflowState, text: string): void {
  assertOpen(state);
  if (state.finalOutput !== null) {
    throw new WorkflowError('Final output already set', 'output_formatter');
  }
  state.finalOutput = text;
}

/**
 * Close the run. Setting `complete` is the last write the record ever sees.
 */
export function completeWorkflow(state: WorkflowState): void {
  assertOpen(state);
  if (state.finalOutput === null || state.finalOutput.trim() === '') {
    throw new WorkflowError('Cannot complete a run without final output', 'output_formatter');
  }
  if (!STAGE_TRANSITIONS[state.currentStage].includes('completed')) {
    throw new WorkflowError(`Cannot complete from stage ${state.currentStage}`, 'output_formatter');
  }
  state.currentStage = 'completed';
  state.stagePath.push('completed');
  state.completedAt = Date.now();
  state.complete = true;
}

export function workflowDurationMs(state: WorkflowState): number {
  return (state.completedAt ?? Date.now()) - state.startedAt;
}

export function debugSummary(state: WorkflowState): DebugSummary {
  return {
    runId: state.runId,
    stagePath: [...state.stagePath],
    executions: state.executions.map((e) => ({ ...e })),
    errors: state.errors.map((e) => ({ ...e })),
    qualityScores: state.qualityResults.map((q) => q.score),
    regenerationCount: state.regenerationCount,
    durationMs: workflowDurationMs(state),
  };
}

function assertOpen(state: WorkflowState): void {
  if (state.complete) {
    throw new WorkflowError(`Run ${state.runId} is already complete`);
  }
}
