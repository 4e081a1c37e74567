// packages/core/src/engine/orchestrator.ts

import { EventEmitter } from 'eventemitter3';
import { Classifier } from '../classification/classifier.js';
import { ImageGenerator } from '../image/image-generator.js';
import { KnowledgeBase } from '../knowledge/knowledge-base.js';
import { parsePreferencesUpdate } from '../memory/preferences.js';
import type { SessionStore } from '../memory/session-store.js';
import { MotifIntegrator } from '../persona/motif-integrator.js';
import { PersonaEngine } from '../persona/persona-engine.js';
import { RomanticWriter } from '../persona/romantic-writer.js';
import { HeuristicQualityScorer, type QualityScorer } from '../scoring/quality-scorer.js';
import { ContentRouterStage } from '../stages/content-router.js';
import { InputProcessorStage } from '../stages/input-processor.js';
import { OutputFormatterStage, buildOutputMetadata } from '../stages/output-formatter.js';
import { PersonaFilterStage } from '../stages/persona-filter.js';
import { QualityValidatorStage } from '../stages/quality-validator.js';
import { ResponseGeneratorStage } from '../stages/response-generator.js';
import {
  completeWorkflow,
  createWorkflowState,
  debugSummary,
  recordError,
  setFinalOutput,
  workflowDurationMs,
} from '../state/workflow-state.js';
import type { PipelineConfig } from '../types/config.js';
import type { EngineEvent } from '../types/events.js';
import type { ImagePayload, ImageRequest } from '../types/image.js';
import type { ImageModel, LanguageModel } from '../types/models.js';
import type { PersonaState } from '../types/persona.js';
import type {
  ConversationContext,
  SessionPreferences,
  TurnRole,
  WorkflowStats,
} from '../types/session.js';
import type { FormatPreferences, ProcessResult, WorkflowState } from '../types/workflow.js';
import { APOLOGY_RESPONSE, CATASTROPHIC_RESPONSE } from '../utils/constants.js';
import { errorMessage, errorName, isRecoverableError } from '../utils/errors.js';
import { type Logger, createLogger } from '../utils/logger.js';
import { type Rng, mathRandom, mulberry32 } from '../utils/random.js';
import { EventBus } from './event-bus.js';
import { WorkflowGraph } from './workflow-graph.js';

interface OrchestratorEvents {
  event: (event: EngineEvent) => void;
}

export interface OrchestratorOptions {
  config: PipelineConfig;
  languageModel: LanguageModel;
  imageModel: ImageModel;
  sessionStore: SessionStore;
  knowledgeBase?: KnowledgeBase;
  qualityScorer?: QualityScorer;
  classifier?: Classifier;
  rng?: Rng;
  logger?: Logger;
  renderPlaceholder?: (request: ImageRequest) => ImagePayload;
}

export interface HistoryEntry {
  role: TurnRole;
  content: string;
}

/**
 * Entry point for one chat service. Owns the shared stages and walks each
 * incoming message through the graph. Per-message data lives only in the
 * WorkflowState created for that message.
 */
export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  private config: PipelineConfig;
  private sessionStore: SessionStore;
  private eventBus: EventBus;
  private graph: WorkflowGraph;
  private logger: Logger;

  constructor(options: OrchestratorOptions) {
    super();
    this.config = options.config;
    this.sessionStore = options.sessionStore;
    this.logger = options.logger ?? createLogger(options.config.advanced.logLevel, 'orchestrator');

    const rng =
      options.rng ??
      (options.config.advanced.seed === undefined ? mathRandom : mulberry32(options.config.advanced.seed));
    const heuristicScorer = new HeuristicQualityScorer();
    const personaEngine = new PersonaEngine(heuristicScorer);
    const imageGenerator = new ImageGenerator(
      options.imageModel,
      personaEngine,
      this.logger.child('image'),
      {
        timeoutMs: options.config.models.image.timeoutMs,
        renderPlaceholder: options.renderPlaceholder,
      },
    );

    const stageLogger = this.logger.child('stage');
    this.eventBus = new EventBus();
    this.graph = new WorkflowGraph(
      {
        input_processor: new InputProcessorStage(stageLogger, options.classifier ?? new Classifier()),
        persona_filter: new PersonaFilterStage(stageLogger, personaEngine, rng),
        content_router: new ContentRouterStage(stageLogger),
        response_generator: new ResponseGeneratorStage(stageLogger, {
          languageModel: options.languageModel,
          imageGenerator,
          knowledgeBase: options.knowledgeBase ?? KnowledgeBase.load(),
          personaEngine,
          romanticWriter: new RomanticWriter(),
          motifIntegrator: new MotifIntegrator(),
          rng,
          textTimeoutMs: options.config.models.text.timeoutMs,
          imageAspectRatio: options.config.models.image.aspectRatio,
        }),
        quality_validator: new QualityValidatorStage(stageLogger, options.qualityScorer ?? heuristicScorer),
        output_formatter: new OutputFormatterStage(stageLogger),
      },
      this.eventBus,
      this.logger.child('graph'),
      options.config.limits.maxSteps,
    );

    // Forward all events from eventBus to this orchestrator
    this.eventBus.on('event', (event) => this.emit('event', event));
  }

  /**
   * Process one user message. Never throws: every failure comes back as a
   * result with `success: false` and an in-persona reply.
   */
  async process(
    userInput: string,
    sessionId: string,
    formatPreferences: FormatPreferences = {},
  ): Promise<ProcessResult> {
    let state: WorkflowState;
    try {
      state = createWorkflowState({
        sessionId,
        userInput,
        config: this.config,
        formatPreferences,
        conversation: this.loadConversation(sessionId),
        persona: this.loadPersona(sessionId) ?? undefined,
      });
    } catch (err) {
      return this.rejected(sessionId, err);
    }

    this.eventBus.emitEvent({
      type: 'session.started',
      sessionId,
      runId: state.runId,
      input: state.rawInput,
      timestamp: '',
    });

    try {
      await this.graph.run(state);
    } catch (err) {
      this.logger.error(`Run ${state.runId} aborted: ${errorMessage(err)}`);
      if (!state.complete) {
        recordError(state, {
          kind: errorName(err),
          message: errorMessage(err),
          stage: 'orchestrator',
          recoverable: isRecoverableError(err),
          timestamp: new Date().toISOString(),
        });
      }
    }

    try {
      if (!state.complete) {
        this.finalizeIncomplete(state);
      }
    } catch (err) {
      return this.rejected(sessionId, err, state);
    }

    this.persist(state);
    const success = state.complete && state.lastError === null;
    const metadata = state.outputMetadata ?? buildOutputMetadata(state);

    if (state.lastError) {
      this.eventBus.emitEvent({
        type: 'session.failed',
        sessionId,
        runId: state.runId,
        error: state.lastError.message,
        lastStage: state.currentStage,
        timestamp: '',
      });
    }
    this.eventBus.emitEvent({
      type: 'session.completed',
      sessionId,
      runId: state.runId,
      success,
      degraded: metadata.degraded,
      durationMs: workflowDurationMs(state),
      timestamp: '',
    });

    return {
      response: state.finalOutput ?? APOLOGY_RESPONSE,
      metadata,
      sessionId,
      runId: state.runId,
      success,
      error: state.lastError,
      ...(this.config.advanced.debug ? { debug: debugSummary(state) } : {}),
    };
  }

  getConversationHistory(sessionId: string): HistoryEntry[] {
    return this.sessionStore
      .getHistory(sessionId)
      .map((turn) => ({ role: turn.role, content: turn.content }));
  }

  /** Additive merge into the session's stored preferences. Throws ValidationError on bad input. */
  updateUserPreferences(sessionId: string, update: unknown): SessionPreferences {
    const parsed = parsePreferencesUpdate(update);
    return this.sessionStore.mergePreferences(sessionId, parsed);
  }

  getWorkflowStats(): WorkflowStats {
    return this.sessionStore.getStats();
  }

  private loadConversation(sessionId: string): ConversationContext | undefined {
    try {
      return {
        history: this.sessionStore.getHistory(sessionId, this.config.session.historyLimit),
        preferences: this.sessionStore.getPreferences(sessionId),
      };
    } catch (err) {
      this.logger.warn(`Could not load session ${sessionId}, continuing without memory: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private loadPersona(sessionId: string): PersonaState | null {
    try {
      return this.sessionStore.getPersona(sessionId);
    } catch (err) {
      this.logger.warn(`Could not load persona for ${sessionId}: ${errorMessage(err)}`);
      return null;
    }
  }

  /** Close a run the graph left open, e.g. after the step ceiling. */
  private finalizeIncomplete(state: WorkflowState): void {
    if (state.currentStage !== 'error') {
      recordError(state, {
        kind: 'WorkflowError',
        message: `Run ${state.runId} ended at ${state.currentStage} without output`,
        stage: 'orchestrator',
        recoverable: false,
        timestamp: new Date().toISOString(),
      });
    }
    if (state.finalOutput === null) {
      setFinalOutput(state, APOLOGY_RESPONSE);
    }
    state.outputMetadata ??= buildOutputMetadata(state);
    completeWorkflow(state);
  }

  private persist(state: WorkflowState): void {
    try {
      this.sessionStore.appendTurn(state.sessionId, 'user', state.rawInput);
      this.sessionStore.appendTurn(state.sessionId, 'assistant', state.finalOutput ?? APOLOGY_RESPONSE);
      this.sessionStore.savePersona(state.sessionId, state.persona);
      const latest = state.qualityResults.at(-1);
      this.sessionStore.recordRun({
        runId: state.runId,
        sessionId: state.sessionId,
        category: state.classification?.category ?? null,
        success: state.complete && state.lastError === null,
        degraded: state.outputMetadata?.degraded ?? false,
        qualityScore: latest?.score ?? null,
        regenerationCount: state.regenerationCount,
        demoFallback: state.outputMetadata?.image?.demoFallback ?? false,
        durationMs: workflowDurationMs(state),
      });
    } catch (err) {
      this.logger.warn(`Failed to save session ${state.sessionId}: ${errorMessage(err)}`);
    }
  }

  private rejected(sessionId: string, err: unknown, state?: WorkflowState): ProcessResult {
    const message = errorMessage(err);
    this.logger.warn(`Message for ${sessionId} rejected: ${message}`);
    this.eventBus.emitEvent({
      type: 'session.failed',
      sessionId,
      runId: state?.runId ?? null,
      error: message,
      lastStage: state?.currentStage ?? null,
      timestamp: '',
    });
    return {
      response: CATASTROPHIC_RESPONSE,
      metadata: { kind: 'failure', generatedAt: new Date().toISOString(), error: message },
      sessionId,
      runId: state?.runId ?? null,
      success: false,
      error: {
        kind: errorName(err),
        message,
        stage: 'orchestrator',
        recoverable: isRecoverableError(err),
        timestamp: new Date().toISOString(),
      },
    };
  }
}
