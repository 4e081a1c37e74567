import { describe, expect, it, vi } from 'vitest';
import { Classifier } from '../../../src/classification/classifier.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { EventBus } from '../../../src/engine/event-bus.js';
import { WorkflowGraph, type StageMap } from '../../../src/engine/workflow-graph.js';
import { ImageGenerator } from '../../../src/image/image-generator.js';
import { KnowledgeBase } from '../../../src/knowledge/knowledge-base.js';
import { MotifIntegrator } from '../../../src/persona/motif-integrator.js';
import { PersonaEngine } from '../../../src/persona/persona-engine.js';
import { RomanticWriter } from '../../../src/persona/romantic-writer.js';
import { HeuristicQualityScorer, type QualityScorer } from '../../../src/scoring/quality-scorer.js';
import { ContentRouterStage } from '../../../src/stages/content-router.js';
import { InputProcessorStage } from '../../../src/stages/input-processor.js';
import { OutputFormatterStage } from '../../../src/stages/output-formatter.js';
import { PersonaFilterStage } from '../../../src/stages/persona-filter.js';
import { QualityValidatorStage } from '../../../src/stages/quality-validator.js';
import { ResponseGeneratorStage } from '../../../src/stages/response-generator.js';
import { createWorkflowState } from '../../../src/state/workflow-state.js';
import type { ImageModel, LanguageModel } from '../../../src/types/models.js';
import type { QualityCheckResult } from '../../../src/types/workflow.js';
import { silentLogger } from '../../../src/utils/logger.js';
import type { Rng } from '../../../src/utils/random.js';

const rng: Rng = { next: () => 0.5 };

const failingScorer: QualityScorer = {
  score: (): QualityCheckResult => ({
    passed: false,
    score: 0.41,
    threshold: 0.85,
    subScores: { personaConsistency: 0.5, motifIntegration: 0.4, romanticDensity: 0.3 },
    issues: ['Romantic language is too sparse'],
    suggestions: ['Add more tomatoes'],
    checkedAt: new Date().toISOString(),
  }),
};

function buildStages(languageModel: LanguageModel): StageMap {
  const heuristic = new HeuristicQualityScorer();
  const personaEngine = new PersonaEngine(heuristic);
  const imageModel: ImageModel = { name: 'fake-image', generate: vi.fn<ImageModel['generate']>() };
  return {
    input_processor: new InputProcessorStage(silentLogger, new Classifier()),
    persona_filter: new PersonaFilterStage(silentLogger, personaEngine, rng),
    content_router: new ContentRouterStage(silentLogger),
    response_generator: new ResponseGeneratorStage(silentLogger, {
      languageModel,
      imageGenerator: new ImageGenerator(imageModel, personaEngine, silentLogger, { timeoutMs: 1000 }),
      knowledgeBase: KnowledgeBase.load(),
      personaEngine,
      romanticWriter: new RomanticWriter(),
      motifIntegrator: new MotifIntegrator(),
      rng,
      textTimeoutMs: 1000,
      imageAspectRatio: '1:1',
    }),
    quality_validator: new QualityValidatorStage(silentLogger, failingScorer),
    output_formatter: new OutputFormatterStage(silentLogger),
  };
}

describe('WorkflowGraph.run', () => {
  it('leaves the session id and raw input untouched through a regenerating run', async () => {
    const complete = vi.fn<LanguageModel['complete']>().mockResolvedValue('Boil the pasta.');
    const graph = new WorkflowGraph(buildStages({ name: 'fake-text', complete }), new EventBus(), silentLogger, 50);
    const rawInput = '  Recipe for pasta   with tomatoes ';
    const state = createWorkflowState({ sessionId: 'ses_graph', userInput: rawInput, config: DEFAULT_CONFIG });

    await graph.run(state);

    expect(state.complete).toBe(true);
    expect(state.regenerationCount).toBe(DEFAULT_CONFIG.quality.maxRegenerationAttempts);
    expect(state.sessionId).toBe('ses_graph');
    expect(state.rawInput).toBe(rawInput);
    expect(state.normalizedInput).toBe('Recipe for pasta with tomatoes');
  });

  it('stops at the step ceiling', async () => {
    const complete = vi.fn<LanguageModel['complete']>().mockResolvedValue('Boil the pasta.');
    const graph = new WorkflowGraph(buildStages({ name: 'fake-text', complete }), new EventBus(), silentLogger, 2);
    const state = createWorkflowState({ sessionId: 'ses_graph', userInput: 'recipe for pasta', config: DEFAULT_CONFIG });

    await expect(graph.run(state)).rejects.toThrow('exceeded 2 steps without finishing');
    expect(state.sessionId).toBe('ses_graph');
  });
});
