// packages/core/src/engine/pipeline.ts

import { loadConfig } from '../config/loader.js';
import { openDatabase } from '../memory/database.js';
import { SessionStore } from '../memory/session-store.js';
import { createGeminiClient } from '../models/gemini-client.js';
import { GeminiImageModel } from '../models/gemini-image-model.js';
import { GeminiLanguageModel } from '../models/gemini-language-model.js';
import type { PipelineConfig, PipelineConfigOverrides } from '../types/config.js';
import type { Logger } from '../utils/logger.js';
import { Orchestrator } from './orchestrator.js';

export interface CreatePipelineOptions {
  config?: PipelineConfig;
  overrides?: PipelineConfigOverrides;
  projectDir?: string;
  apiKey?: string;
  logger?: Logger;
}

/**
 * Wire the production collaborators: Gemini text and image models and a
 * SQLite session store at `session.databasePath`.
 */
export function createPipeline(options: CreatePipelineOptions = {}): Orchestrator {
  const config =
    options.config ?? loadConfig({ projectDir: options.projectDir, overrides: options.overrides });
  const client = createGeminiClient(options.apiKey);
  const db = openDatabase(config.session.databasePath);
  return new Orchestrator({
    config,
    languageModel: new GeminiLanguageModel(client.models, config.models.text),
    imageModel: new GeminiImageModel(client.models, config.models.image),
    sessionStore: new SessionStore(db),
    logger: options.logger,
  });
}
