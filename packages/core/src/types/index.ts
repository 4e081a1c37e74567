// packages/core/src/types/index.ts -- barrel re-export

export type {
  PersonaConfig,
  QualityConfig,
  TextModelConfig,
  ImageModelConfig,
  ModelsConfig,
  OutputConfig,
  SessionConfig,
  LimitsConfig,
  AdvancedConfig,
  PipelineConfig,
  DeepPartial,
  PipelineConfigOverrides,
} from './config.js';

export type {
  WorkflowStage,
  StageName,
  ContentCategory,
  ProcessingPriority,
  Platform,
  ExtractedEntities,
  Classification,
  PrimaryPath,
  RoutingDecision,
  ProcessingFlags,
  QualitySubScores,
  QualityCheckResult,
  StageExecutionRecord,
  ProcessingErrorRecord,
  TextGeneration,
  ImageGeneration,
  GenerationResult,
  FormatPreferences,
  FeatureFlags,
  QualityWeights,
  RunSettings,
  WorkflowState,
  ImageMetadata,
  OutputMetadata,
  FailureMetadata,
  DebugSummary,
  ProcessResult,
} from './workflow.js';

export type {
  Mood,
  PersonaDimensions,
  MoodTransition,
  PersonaContext,
  PersonaState,
  PersonaResponse,
} from './persona.js';

export type {
  ImageStyle,
  AspectRatio,
  ImageDetails,
  ImageRequest,
  ImagePayload,
  ImageResult,
} from './image.js';

export type {
  ChatMessage,
  CompletionOptions,
  LanguageModel,
  ImageGenerationParams,
  ImageModel,
} from './models.js';

export type {
  SkillLevel,
  SessionPreferences,
  PreferencesUpdate,
  TurnRole,
  ConversationTurn,
  ConversationContext,
  RunRecord,
  WorkflowStats,
} from './session.js';

export type { KnowledgeKind, KnowledgeRecord } from './knowledge.js';

export type {
  SessionStartedEvent,
  SessionCompletedEvent,
  SessionFailedEvent,
  StageStartedEvent,
  StageCompletedEvent,
  StageFailedEvent,
  RouteSelectedEvent,
  QualityGateEvent,
  EngineEvent,
} from './events.js';
