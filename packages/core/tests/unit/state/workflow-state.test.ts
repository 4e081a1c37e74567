import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import {
  addQualityResult,
  advanceStage,
  completeWorkflow,
  createWorkflowState,
  getPersonaState,
  incrementRegeneration,
  isRegenerationNeeded,
  recordError,
  setFinalOutput,
} from '../../../src/state/workflow-state.js';
import type { QualityCheckResult, WorkflowState } from '../../../src/types/workflow.js';
import { ValidationError, WorkflowError } from '../../../src/utils/errors.js';

function newState(userInput = 'recipe for pasta'): WorkflowState {
  return createWorkflowState({ sessionId: 'ses_test', userInput, config: DEFAULT_CONFIG });
}

function qualityResult(passed: boolean): QualityCheckResult {
  return {
    passed,
    score: passed ? 0.9 : 0.4,
    threshold: 0.85,
    subScores: { personaConsistency: 0.5, motifIntegration: 0.5, romanticDensity: 0.2 },
    issues: [],
    suggestions: [],
    checkedAt: new Date().toISOString(),
  };
}

function walkToQualityChecked(state: WorkflowState): void {
  advanceStage(state, 'classified');
  advanceStage(state, 'persona_applied');
  advanceStage(state, 'processing');
  advanceStage(state, 'generated');
  advanceStage(state, 'quality_checked');
}

describe('createWorkflowState', () => {
  it('starts at input_received with a fresh run id', () => {
    const state = newState();
    expect(state.currentStage).toBe('input_received');
    expect(state.stagePath).toEqual(['input_received']);
    expect(state.runId).toMatch(/^run_/);
    expect(state.complete).toBe(false);
    expect(state.regenerationCount).toBe(0);
    expect(state.persona.mood).toBe('enthusiastic');
    expect(state.settings.maxRegenerationAttempts).toBe(3);
  });

  it('gives each run its own run id', () => {
    expect(newState().runId).not.toBe(newState().runId);
  });

  it('rejects an empty message', () => {
    expect(() => newState('   ')).toThrow(ValidationError);
  });

  it('rejects a message over the length limit', () => {
    expect(() => newState('a'.repeat(DEFAULT_CONFIG.limits.maxInputLength + 1))).toThrow(
      ValidationError,
    );
  });

  it('rejects an empty session id', () => {
    expect(() =>
      createWorkflowState({ sessionId: '', userInput: 'hi', config: DEFAULT_CONFIG }),
    ).toThrow(ValidationError);
  });

  it('applies the platform preference to the persona', () => {
    const state = createWorkflowState({
      sessionId: 'ses_test',
      userInput: 'hi',
      config: DEFAULT_CONFIG,
      formatPreferences: { platform: 'twitter' },
    });
    expect(state.persona.context.platform).toBe('twitter');
  });

  it('freezes the settings snapshot', () => {
    expect(Object.isFrozen(newState().settings)).toBe(true);
  });
});

describe('advanceStage', () => {
  it('follows legal transitions and records the path', () => {
    const state = newState();
    walkToQualityChecked(state);
    expect(state.stagePath).toEqual([
      'input_received',
      'classified',
      'persona_applied',
      'processing',
      'generated',
      'quality_checked',
    ]);
  });

  it('rejects an illegal transition', () => {
    const state = newState();
    expect(() => advanceStage(state, 'generated')).toThrow(WorkflowError);
  });

  it('stays in error once entered', () => {
    const state = newState();
    recordError(state, {
      kind: 'TimeoutError',
      message: 'slow',
      stage: 'input_processor',
      recoverable: true,
      timestamp: new Date().toISOString(),
    });
    advanceStage(state, 'classified');
    expect(state.currentStage).toBe('error');
    expect(state.lastError?.kind).toBe('TimeoutError');
  });
});

describe('regeneration', () => {
  it('needs regeneration only while attempts remain', () => {
    const state = newState();
    walkToQualityChecked(state);
    addQualityResult(state, qualityResult(false));
    expect(isRegenerationNeeded(state)).toBe(true);

    incrementRegeneration(state);
    expect(state.currentStage).toBe('processing');
    expect(state.regenerationCount).toBe(1);
  });

  it('refuses to go past the attempt limit', () => {
    const state = newState();
    for (let attempt = 0; attempt < 3; attempt++) {
      if (attempt === 0) {
        walkToQualityChecked(state);
      } else {
        advanceStage(state, 'generated');
        advanceStage(state, 'quality_checked');
      }
      addQualityResult(state, qualityResult(false));
      incrementRegeneration(state);
    }
    advanceStage(state, 'generated');
    advanceStage(state, 'quality_checked');
    addQualityResult(state, qualityResult(false));
    expect(state.regenerationCount).toBe(3);
    expect(isRegenerationNeeded(state)).toBe(false);
    expect(() => incrementRegeneration(state)).toThrow(WorkflowError);
  });

  it('does not regenerate a passing draft', () => {
    const state = newState();
    walkToQualityChecked(state);
    addQualityResult(state, qualityResult(true));
    expect(state.qualityPassed).toBe(true);
    expect(isRegenerationNeeded(state)).toBe(false);
  });
});

describe('persona access', () => {
  it('hands out copies, not the stored persona', () => {
    const state = newState();
    const copy = getPersonaState(state);
    copy.mood = 'serene';
    copy.context.conversationTurns = 99;
    expect(state.persona.mood).toBe('enthusiastic');
    expect(state.persona.context.conversationTurns).toBe(0);
  });
});

describe('completeWorkflow', () => {
  it('requires final output', () => {
    const state = newState();
    walkToQualityChecked(state);
    expect(() => completeWorkflow(state)).toThrow(WorkflowError);
  });

  it('completes from quality_checked and locks the record', () => {
    const state = newState();
    walkToQualityChecked(state);
    setFinalOutput(state, 'Buon appetito!');
    completeWorkflow(state);
    expect(state.complete).toBe(true);
    expect(state.currentStage).toBe('completed');
    expect(state.completedAt).not.toBeNull();
    expect(() => setFinalOutput(state, 'again')).toThrow(WorkflowError);
  });

  it('completes from error', () => {
    const state = newState();
    recordError(state, {
      kind: 'APIError',
      message: 'upstream',
      stage: 'response_generator',
      recoverable: true,
      timestamp: new Date().toISOString(),
    });
    setFinalOutput(state, 'sorry');
    completeWorkflow(state);
    expect(state.stagePath.at(-1)).toBe('completed');
  });

  it('cannot complete from the middle of the pipeline', () => {
    const state = newState();
    advanceStage(state, 'classified');
    setFinalOutput(state, 'too early');
    expect(() => completeWorkflow(state)).toThrow(WorkflowError);
  });
});
