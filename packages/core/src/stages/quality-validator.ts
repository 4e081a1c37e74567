// packages/core/src/stages/quality-validator.ts

import type { QualityScorer } from '../scoring/quality-scorer.js';
import { addQualityResult, advanceStage } from '../state/workflow-state.js';
import type { GenerationResult, WorkflowState } from '../types/workflow.js';
import type { Logger } from '../utils/logger.js';
import { Stage } from './stage.js';

export function draftText(generation: GenerationResult | null): string {
  if (generation === null) {
    return '';
  }
  switch (generation.kind) {
    case 'text':
      return generation.selected || generation.content;
    case 'image':
      return generation.content || generation.image.commentary;
  }
}

/** Scores the current draft and appends the result to the quality history. */
export class QualityValidatorStage extends Stage {
  readonly name = 'quality_validator' as const;

  constructor(
    logger: Logger,
    private readonly scorer: QualityScorer,
  ) {
    super(logger);
  }

  protected run(state: WorkflowState): void {
    const result = this.scorer.score(draftText(state.generation), state.persona.dimensions, {
      threshold: state.settings.qualityThreshold,
      weights: state.settings.weights,
    });
    addQualityResult(state, result);
    this.logger.debug(
      `Quality ${result.score.toFixed(3)} (threshold ${result.threshold}) for ${state.runId}, attempt ${state.regenerationCount + 1}`,
    );
    advanceStage(state, 'quality_checked');
  }
}
