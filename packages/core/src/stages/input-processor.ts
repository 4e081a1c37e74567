// packages/core/src/stages/input-processor.ts

import type { Classifier } from '../classification/classifier.js';
import { normalizeInput } from '../classification/classifier.js';
import { advanceStage } from '../state/workflow-state.js';
import type { WorkflowState } from '../types/workflow.js';
import type { Logger } from '../utils/logger.js';
import { Stage } from './stage.js';

/** Normalizes the message, then classifies intent, entities and priority. */
export class InputProcessorStage extends Stage {
  readonly name = 'input_processor' as const;

  constructor(
    logger: Logger,
    private readonly classifier: Classifier,
  ) {
    super(logger);
  }

  protected run(state: WorkflowState): void {
    const normalized = normalizeInput(state.rawInput);
    state.normalizedInput = normalized;
    state.classification = this.classifier.classify(normalized);
    this.logger.debug(
      `Classified ${state.runId} as ${state.classification.category} (${state.classification.confidence.toFixed(2)})`,
    );
    advanceStage(state, 'classified');
  }
}
