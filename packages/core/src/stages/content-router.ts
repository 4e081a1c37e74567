// packages/core/src/stages/content-router.ts

import { advanceStage } from '../state/workflow-state.js';
import type { PersonaState } from '../types/persona.js';
import type {
  ContentCategory,
  ProcessingFlags,
  RoutingDecision,
  RunSettings,
  WorkflowState,
} from '../types/workflow.js';
import { CLARIFICATION_CONFIDENCE_THRESHOLD } from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { Stage } from './stage.js';

/** General chat only picks up the motif from a fairly obsessed persona. */
const GENERAL_CHAT_MOTIF_LEVEL = 7;

export function makeRoutingDecision(category: ContentCategory, confidence: number): RoutingDecision {
  let decision: RoutingDecision;
  switch (category) {
    case 'recipe_request':
      decision = {
        primaryPath: 'recipe_generation',
        nextStages: ['knowledge_lookup', 'recipe_synthesis'],
        requiresKnowledgeLookup: true,
        requiresRecipeSynthesis: true,
        motifEnhancer: false,
        needsClarification: false,
      };
      break;
    case 'cooking_question':
    case 'technique_question':
      decision = {
        primaryPath: 'knowledge_response',
        nextStages: ['knowledge_lookup'],
        requiresKnowledgeLookup: true,
        requiresRecipeSynthesis: false,
        motifEnhancer: false,
        needsClarification: false,
      };
      break;
    case 'ingredient_inquiry':
      decision = {
        primaryPath: 'ingredient_analysis',
        nextStages: ['knowledge_lookup', 'motif_enhancer'],
        requiresKnowledgeLookup: true,
        requiresRecipeSynthesis: false,
        motifEnhancer: true,
        needsClarification: false,
      };
      break;
    case 'food_pairing':
      decision = {
        primaryPath: 'pairing_analysis',
        nextStages: ['knowledge_lookup', 'motif_enhancer'],
        requiresKnowledgeLookup: true,
        requiresRecipeSynthesis: false,
        motifEnhancer: true,
        needsClarification: false,
      };
      break;
    case 'image_request':
      decision = {
        primaryPath: 'image_generation',
        nextStages: ['image_generator'],
        requiresKnowledgeLookup: false,
        requiresRecipeSynthesis: false,
        motifEnhancer: false,
        needsClarification: false,
      };
      break;
    default:
      decision = {
        primaryPath: 'general_response',
        nextStages: ['response_generator'],
        requiresKnowledgeLookup: false,
        requiresRecipeSynthesis: false,
        motifEnhancer: false,
        needsClarification: false,
      };
  }
  if (confidence < CLARIFICATION_CONFIDENCE_THRESHOLD) {
    decision.nextStages.push('clarification_generator');
    decision.needsClarification = true;
  }
  return decision;
}

export function buildProcessingFlags(
  category: ContentCategory,
  decision: RoutingDecision,
  settings: RunSettings,
  persona: PersonaState,
): ProcessingFlags {
  const { features } = settings;
  let integrateMotif = features.motifIntegration;
  let applyRomanticWriting = features.romanticWriting;
  if (category === 'recipe_request') {
    integrateMotif = true;
    applyRomanticWriting = true;
  } else if (category === 'general_chat') {
    integrateMotif =
      features.motifIntegration && persona.dimensions.motifObsession >= GENERAL_CHAT_MOTIF_LEVEL;
  }
  const generateImages = category === 'image_request' && features.imageGeneration;
  return {
    applyRomanticWriting,
    integrateMotif: integrateMotif || (decision.motifEnhancer && features.motifIntegration),
    generateImages,
    useMemory: features.memorySystem,
    // The image commentary is templated, so another pass cannot raise its score.
    qualityGateRequired: features.qualityGates && !generateImages,
    knowledgeLookup: decision.requiresKnowledgeLookup && features.knowledgeLookup,
    recipeSynthesis: decision.requiresRecipeSynthesis,
  };
}

/** Chooses the processing path and the flags the generator will honor. */
export class ContentRouterStage extends Stage {
  readonly name = 'content_router' as const;

  constructor(logger: Logger) {
    super(logger);
  }

  protected run(state: WorkflowState): void {
    const classification = state.classification;
    if (!classification) {
      throw new WorkflowError('Cannot route a message that was never classified', this.name);
    }
    const decision = makeRoutingDecision(classification.category, classification.confidence);
    state.routing = decision;
    state.flags = buildProcessingFlags(
      classification.category,
      decision,
      state.settings,
      state.persona,
    );
    advanceStage(state, 'processing');
  }
}
