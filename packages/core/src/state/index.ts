// packages/core/src/state/index.ts -- barrel re-export

export {
  STAGE_TRANSITIONS,
  addQualityResult,
  advanceStage,
  completeWorkflow,
  createWorkflowState,
  debugSummary,
  getPersonaState,
  incrementRegeneration,
  isRegenerationNeeded,
  latestQualityResult,
  recordError,
  recordExecution,
  setFinalOutput,
  setPersonaState,
  workflowDurationMs,
} from './workflow-state.js';
export type { CreateStateParams } from './workflow-state.js';
export {
  clonePersonaState,
  createPersonaState,
  recordMoodTransition,
  restorePersonaState,
  storedPersonaSchema,
  validateDimensions,
} from './persona-state.js';
