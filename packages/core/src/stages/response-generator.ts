// packages/core/src/stages/response-generator.ts

import type { ImageGenerator } from '../image/image-generator.js';
import { createImageRequest } from '../image/image-request.js';
import type { KnowledgeBase } from '../knowledge/knowledge-base.js';
import type { MotifIntegrator } from '../persona/motif-integrator.js';
import type { PersonaEngine } from '../persona/persona-engine.js';
import { renderGenerationPrompt } from '../persona/prompts.js';
import type { RomanticWriter } from '../persona/romantic-writer.js';
import { advanceStage, latestQualityResult } from '../state/workflow-state.js';
import type { AspectRatio } from '../types/image.js';
import type { LanguageModel } from '../types/models.js';
import type {
  Classification,
  ProcessingFlags,
  WorkflowState,
} from '../types/workflow.js';
import { WorkflowError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { Rng } from '../utils/random.js';
import { withTimeout } from '../utils/timeout.js';
import { Stage } from './stage.js';

const EMPTY_COMPLETION_FALLBACK =
  'My darling, the words escaped me for a moment, but my heart is still simmering with ideas for you!';

export interface ResponseGeneratorDeps {
  languageModel: LanguageModel;
  imageGenerator: ImageGenerator;
  knowledgeBase: KnowledgeBase;
  personaEngine: PersonaEngine;
  romanticWriter: RomanticWriter;
  motifIntegrator: MotifIntegrator;
  rng: Rng;
  textTimeoutMs: number;
  imageAspectRatio: AspectRatio;
}

/**
 * Produces the draft: a language-model reply shaped by the persona, or an
 * image with persona commentary for image requests.
 */
export class ResponseGeneratorStage extends Stage {
  readonly name = 'response_generator' as const;

  constructor(
    logger: Logger,
    private readonly deps: ResponseGeneratorDeps,
  ) {
    super(logger);
  }

  protected async run(state: WorkflowState): Promise<void> {
    const { classification, flags } = state;
    if (!classification || !flags) {
      throw new WorkflowError('Generation requires classification and routing first', this.name);
    }
    if (classification.category === 'image_request' && flags.generateImages) {
      await this.generateImage(state, classification, flags);
    } else {
      await this.generateText(state, classification, flags);
    }
    advanceStage(state, 'generated');
  }

  private async generateText(
    state: WorkflowState,
    classification: Classification,
    flags: ProcessingFlags,
  ): Promise<void> {
    const { deps } = this;
    const { entities } = classification;

    state.knowledge = flags.knowledgeLookup
      ? deps.knowledgeBase.lookupAll([...entities.ingredients, ...entities.techniques, ...entities.cuisines])
      : [];

    const limit = state.settings.historyLimit;
    const history = flags.useMemory && limit > 0 ? state.conversation.history.slice(-limit) : [];
    const messages = renderGenerationPrompt({
      input: state.normalizedInput ?? state.rawInput,
      category: classification.category,
      persona: state.persona,
      entities,
      flags,
      knowledge: state.knowledge,
      preferences: state.conversation.preferences,
      history,
      feedback: state.regenerationCount > 0 ? latestQualityResult(state) : null,
    });

    const raw = await withTimeout(
      deps.languageModel.complete(messages),
      deps.textTimeoutMs,
      `text generation (${deps.languageModel.name})`,
    );

    let content = raw.trim() || EMPTY_COMPLETION_FALLBACK;
    if (flags.applyRomanticWriting) {
      content = deps.romanticWriter.rewrite(content, state.persona, entities.ingredients, deps.rng);
    }
    if (flags.integrateMotif) {
      content = deps.motifIntegrator.integrate(
        content,
        state.persona,
        state.settings.motifThreshold,
        deps.rng,
      );
    }
    content = deps.personaEngine.adaptToPlatform(content, state.persona);

    state.generation = { kind: 'text', content, variations: [content], selected: content };
  }

  private async generateImage(
    state: WorkflowState,
    classification: Classification,
    flags: ProcessingFlags,
  ): Promise<void> {
    const details = classification.entities.image;
    // A bare "picture of" leaves no description; describe the whole message instead.
    const request = createImageRequest({
      description: details?.description || state.normalizedInput || state.rawInput,
      style: details?.style ?? undefined,
      includeMotif: details?.includeMotif ?? true,
      romanticElements: flags.applyRomanticWriting,
      aspectRatio: this.deps.imageAspectRatio,
    });
    const image = await this.deps.imageGenerator.generate(request, this.deps.rng);
    if (image.demoFallback) {
      this.logger.info(`Served demo placeholder image for ${state.runId}`);
    }
    state.generation = { kind: 'image', content: image.commentary, image };
  }
}
