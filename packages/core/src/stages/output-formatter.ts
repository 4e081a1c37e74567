// packages/core/src/stages/output-formatter.ts

import {
  completeWorkflow,
  latestQualityResult,
  setFinalOutput,
} from '../state/workflow-state.js';
import type { ImageMetadata, OutputMetadata, WorkflowState } from '../types/workflow.js';
import { APOLOGY_RESPONSE } from '../utils/constants.js';
import type { Logger } from '../utils/logger.js';
import { draftText } from './quality-validator.js';
import { Stage } from './stage.js';

function imageMetadata(state: WorkflowState): ImageMetadata | null {
  if (state.generation?.kind !== 'image') {
    return null;
  }
  const { image } = state.generation;
  return {
    success: image.success,
    demoFallback: image.demoFallback,
    style: image.request.style,
    description: image.request.description,
    prompt: image.prompt,
    latencyMs: image.latencyMs,
    model: image.model,
    mimeType: image.payload?.mimeType ?? null,
    base64: image.payload?.base64 ?? null,
  };
}

export function buildOutputMetadata(state: WorkflowState): OutputMetadata {
  const latest = latestQualityResult(state);
  return {
    kind: 'output',
    generatedAt: new Date().toISOString(),
    elapsedMs: Date.now() - state.startedAt,
    category: state.classification?.category ?? null,
    priority: state.classification?.priority ?? null,
    mood: state.persona.mood,
    qualityScore: latest?.score ?? null,
    qualityPassed: state.qualityPassed,
    degraded: latest !== null && !latest.passed && state.lastError === null,
    subScores: latest ? { ...latest.subScores } : null,
    issues: latest ? [...latest.issues] : [],
    regenerationCount: state.regenerationCount,
    needsClarification: state.routing?.needsClarification ?? false,
    hadError: state.lastError !== null,
    image: imageMetadata(state),
  };
}

/**
 * Picks the best available content, adds the signature and closes the run.
 * Also runs for failed runs so the user always gets a reply.
 */
export class OutputFormatterStage extends Stage {
  readonly name = 'output_formatter' as const;
  protected override readonly runsOnError = true;

  constructor(logger: Logger) {
    super(logger);
  }

  protected run(state: WorkflowState): void {
    const body = draftText(state.generation).trim() || APOLOGY_RESPONSE;
    const includeSignature =
      state.formatPreferences.includeSignature ?? state.settings.includeSignature;
    const signature = state.settings.signature.trim();
    setFinalOutput(state, includeSignature && signature ? `${body}\n\n${signature}` : body);
    state.outputMetadata = buildOutputMetadata(state);
  }

  protected override afterRecorded(state: WorkflowState): void {
    completeWorkflow(state);
  }
}
