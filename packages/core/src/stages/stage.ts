// packages/core/src/stages/stage.ts

import { recordError, recordExecution } from '../state/workflow-state.js';
import type { StageName, WorkflowState } from '../types/workflow.js';
import { errorMessage, errorName, isRecoverableError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Common execution contract for every pipeline stage.
 *
 * `execute` times the stage, appends an execution record and never throws:
 * a failure inside `run` is classified, logged into the state's error list,
 * and the state moves to `error` for the routing functions to observe.
 *
 * Stages are shared across requests. Everything per-request lives in the
 * state passed in; subclasses keep only configuration and collaborators.
 */
export abstract class Stage {
  abstract readonly name: StageName;

  /** Whether the stage still does its work once the run is in `error`. */
  protected readonly runsOnError: boolean = false;

  constructor(protected readonly logger: Logger) {}

  protected abstract run(state: WorkflowState): Promise<void> | void;

  /** Runs once the successful execution record is in place. */
  protected afterRecorded(_state: WorkflowState): void {}

  willRun(state: WorkflowState): boolean {
    return this.runsOnError || state.currentStage !== 'error';
  }

  async execute(state: WorkflowState): Promise<WorkflowState> {
    if (!this.willRun(state)) {
      this.logger.debug(`Skipping ${this.name}: run ${state.runId} is in error`);
      return state;
    }

    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    try {
      await this.run(state);
      recordExecution(state, {
        stage: this.name,
        startedAt,
        endedAt: new Date().toISOString(),
        durationMs: Date.now() - started,
        success: true,
      });
      this.afterRecorded(state);
    } catch (err) {
      const recoverable = isRecoverableError(err);
      recordError(state, {
        kind: errorName(err),
        message: errorMessage(err),
        stage: this.name,
        recoverable,
        timestamp: new Date().toISOString(),
      });
      recordExecution(state, {
        stage: this.name,
        startedAt,
        endedAt: new Date().toISOString(),
        durationMs: Date.now() - started,
        success: false,
      });
      this.logger.warn(
        `Stage ${this.name} failed (${recoverable ? 'recoverable' : 'non-recoverable'}): ${errorMessage(err)}`,
      );
    }
    return state;
  }
}
