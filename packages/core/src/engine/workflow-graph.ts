// packages/core/src/engine/workflow-graph.ts

import { incrementRegeneration, latestQualityResult } from '../state/workflow-state.js';
import type { Stage } from '../stages/stage.js';
import type { StageName, WorkflowState } from '../types/workflow.js';
import { WorkflowError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { EventBus } from './event-bus.js';
import { qualityGate, qualityTarget, routeAfterContentRouter, routeTarget } from './routing.js';

type Transition =
  | { kind: 'next'; to: StageName }
  | { kind: 'route' }
  | { kind: 'quality' }
  | { kind: 'end' };

/** Static edges. `route` and `quality` are decided per run from the state. */
const TRANSITIONS: Record<StageName, Transition> = {
  input_processor: { kind: 'next', to: 'persona_filter' },
  persona_filter: { kind: 'next', to: 'content_router' },
  content_router: { kind: 'route' },
  response_generator: { kind: 'next', to: 'quality_validator' },
  quality_validator: { kind: 'quality' },
  output_formatter: { kind: 'end' },
};

export const ENTRY_STAGE: StageName = 'input_processor';

export type StageMap = Record<StageName, Stage>;

/**
 * Walks the stage graph for one run. Stages record their own failures, so
 * the walk only throws on a broken graph or when the step ceiling is hit.
 */
export class WorkflowGraph {
  constructor(
    private readonly stages: StageMap,
    private readonly eventBus: EventBus,
    private readonly logger: Logger,
    private readonly maxSteps: number,
  ) {}

  async run(state: WorkflowState): Promise<WorkflowState> {
    let current: StageName | null = ENTRY_STAGE;
    let steps = 0;

    while (current !== null) {
      steps += 1;
      if (steps > this.maxSteps) {
        throw new WorkflowError(
          `Run ${state.runId} exceeded ${this.maxSteps} steps without finishing`,
          current,
        );
      }
      await this.runStage(current, state);
      current = this.nextStage(current, state);
    }
    return state;
  }

  private async runStage(name: StageName, state: WorkflowState): Promise<void> {
    const stage = this.stages[name];
    if (!stage.willRun(state)) {
      await stage.execute(state);
      return;
    }

    this.eventBus.emitEvent({ type: 'stage.started', runId: state.runId, stage: name, timestamp: '' });
    const errorsBefore = state.errors.length;
    const started = Date.now();
    await stage.execute(state);

    const failure = state.errors.length > errorsBefore ? state.lastError : null;
    if (failure) {
      this.eventBus.emitEvent({
        type: 'stage.failed',
        runId: state.runId,
        stage: name,
        error: failure.message,
        recoverable: failure.recoverable,
        timestamp: '',
      });
    } else {
      this.eventBus.emitEvent({
        type: 'stage.completed',
        runId: state.runId,
        stage: name,
        durationMs: Date.now() - started,
        timestamp: '',
      });
    }
  }

  private nextStage(from: StageName, state: WorkflowState): StageName | null {
    const transition = TRANSITIONS[from];
    switch (transition.kind) {
      case 'next':
        return transition.to;
      case 'end':
        return null;
      case 'route': {
        const edge = routeAfterContentRouter(state);
        this.eventBus.emitEvent({ type: 'route.selected', runId: state.runId, edge, timestamp: '' });
        this.logger.debug(`Run ${state.runId} routed via ${edge}`);
        return routeTarget(edge);
      }
      case 'quality': {
        const edge = qualityGate(state);
        this.eventBus.emitEvent({
          type: 'quality.gate',
          runId: state.runId,
          edge,
          score: latestQualityResult(state)?.score ?? null,
          regenerationCount: state.regenerationCount,
          maxAttempts: state.settings.maxRegenerationAttempts,
          timestamp: '',
        });
        if (edge === 'regenerate') {
          incrementRegeneration(state);
          this.logger.info(
            `Regenerating ${state.runId} (attempt ${state.regenerationCount} of ${state.settings.maxRegenerationAttempts})`,
          );
        }
        return qualityTarget(edge);
      }
      default: {
        const unreachable: never = transition;
        throw new WorkflowError(`Unknown transition ${JSON.stringify(unreachable)}`, from);
      }
    }
  }
}
