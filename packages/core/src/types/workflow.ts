// packages/core/src/types/workflow.ts

import type { ImageDetails, ImageResult, ImageStyle } from './image.js';
import type { KnowledgeRecord } from './knowledge.js';
import type { Mood, PersonaResponse, PersonaState } from './persona.js';
import type { ConversationContext } from './session.js';

/** Position of a run in the stage state machine. `error` is absorbing until completion. */
export type WorkflowStage =
  | 'input_received'
  | 'classified'
  | 'persona_applied'
  | 'processing'
  | 'generated'
  | 'quality_checked'
  | 'completed'
  | 'error';

export type StageName =
  | 'input_processor'
  | 'persona_filter'
  | 'content_router'
  | 'response_generator'
  | 'quality_validator'
  | 'output_formatter';

export type ContentCategory =
  | 'recipe_request'
  | 'cooking_question'
  | 'ingredient_inquiry'
  | 'technique_question'
  | 'food_pairing'
  | 'nutrition_question'
  | 'image_request'
  | 'meal_planning'
  | 'recipe_review'
  | 'cooking_tips'
  | 'general_chat';

export type ProcessingPriority = 'low' | 'normal' | 'high' | 'urgent';

export type Platform = 'chat' | 'twitter' | 'linkedin';

export interface ExtractedEntities {
  ingredients: string[];
  techniques: string[];
  cuisines: string[];
  dietary: string[];
  /** Only set for image requests. */
  image: ImageDetails | null;
}

export interface Classification {
  category: ContentCategory;
  confidence: number;
  entities: ExtractedEntities;
  priority: ProcessingPriority;
}

export type PrimaryPath =
  | 'recipe_generation'
  | 'knowledge_response'
  | 'ingredient_analysis'
  | 'pairing_analysis'
  | 'image_generation'
  | 'general_response';

export interface RoutingDecision {
  primaryPath: PrimaryPath;
  nextStages: string[];
  requiresKnowledgeLookup: boolean;
  requiresRecipeSynthesis: boolean;
  motifEnhancer: boolean;
  needsClarification: boolean;
}

export interface ProcessingFlags {
  applyRomanticWriting: boolean;
  integrateMotif: boolean;
  generateImages: boolean;
  useMemory: boolean;
  qualityGateRequired: boolean;
  knowledgeLookup: boolean;
  recipeSynthesis: boolean;
}

export interface QualitySubScores {
  personaConsistency: number;
  motifIntegration: number;
  romanticDensity: number;
}

export interface QualityCheckResult {
  passed: boolean;
  /** Weighted sum of the sub-scores. Not normalized. */
  score: number;
  threshold: number;
  subScores: QualitySubScores;
  issues: string[];
  suggestions: string[];
  checkedAt: string;
}

export interface StageExecutionRecord {
  stage: StageName;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  success: boolean;
}

export interface ProcessingErrorRecord {
  kind: string;
  message: string;
  stage: StageName | 'orchestrator';
  recoverable: boolean;
  timestamp: string;
}

export interface TextGeneration {
  kind: 'text';
  content: string;
  variations: string[];
  selected: string;
}

export interface ImageGeneration {
  kind: 'image';
  /** Persona commentary that accompanies the image. */
  content: string;
  image: ImageResult;
}

export type GenerationResult = TextGeneration | ImageGeneration;

export interface FormatPreferences {
  includeSignature?: boolean;
  platform?: Platform;
}

export interface FeatureFlags {
  romanticWriting: boolean;
  motifIntegration: boolean;
  qualityGates: boolean;
  imageGeneration: boolean;
  memorySystem: boolean;
  knowledgeLookup: boolean;
}

export interface QualityWeights {
  persona: number;
  motif: number;
  romance: number;
}

/** Configuration frozen into each run at creation. */
export interface RunSettings {
  features: FeatureFlags;
  qualityThreshold: number;
  weights: QualityWeights;
  maxRegenerationAttempts: number;
  motifThreshold: number;
  includeSignature: boolean;
  signature: string;
  historyLimit: number;
}

export interface WorkflowState {
  readonly sessionId: string;
  readonly runId: string;
  readonly rawInput: string;
  readonly settings: RunSettings;
  readonly startedAt: number;

  currentStage: WorkflowStage;
  stagePath: WorkflowStage[];
  complete: boolean;
  regenerationCount: number;

  normalizedInput: string | null;
  classification: Classification | null;

  persona: PersonaState;
  personaResponse: PersonaResponse | null;

  routing: RoutingDecision | null;
  flags: ProcessingFlags | null;
  knowledge: KnowledgeRecord[];

  generation: GenerationResult | null;

  qualityResults: QualityCheckResult[];
  qualityPassed: boolean;

  executions: StageExecutionRecord[];
  errors: ProcessingErrorRecord[];
  lastError: ProcessingErrorRecord | null;

  finalOutput: string | null;
  outputMetadata: OutputMetadata | null;

  formatPreferences: FormatPreferences;
  conversation: ConversationContext;
  completedAt: number | null;
}

export interface ImageMetadata {
  success: boolean;
  demoFallback: boolean;
  style: ImageStyle;
  description: string;
  prompt: string;
  latencyMs: number;
  model: string;
  mimeType: string | null;
  base64: string | null;
}

export interface OutputMetadata {
  kind: 'output';
  generatedAt: string;
  elapsedMs: number;
  category: ContentCategory | null;
  priority: ProcessingPriority | null;
  mood: Mood;
  qualityScore: number | null;
  qualityPassed: boolean;
  /** Attempts ran out before the score reached the threshold. */
  degraded: boolean;
  subScores: QualitySubScores | null;
  issues: string[];
  regenerationCount: number;
  needsClarification: boolean;
  hadError: boolean;
  image: ImageMetadata | null;
}

export interface FailureMetadata {
  kind: 'failure';
  generatedAt: string;
  error: string;
}

export interface DebugSummary {
  runId: string;
  stagePath: WorkflowStage[];
  executions: StageExecutionRecord[];
  errors: ProcessingErrorRecord[];
  qualityScores: number[];
  regenerationCount: number;
  durationMs: number;
}

export interface ProcessResult {
  response: string;
  metadata: OutputMetadata | FailureMetadata;
  sessionId: string;
  runId: string | null;
  success: boolean;
  error: ProcessingErrorRecord | null;
  debug?: DebugSummary;
}
