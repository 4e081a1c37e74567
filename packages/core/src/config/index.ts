// packages/core/src/config/index.ts

export { DEFAULT_CONFIG } from './defaults.js';
export { CONFIG_FILENAME, deepMerge, envOverrides, loadConfig } from './loader.js';
export {
  moodSchema,
  personaDimensionsSchema,
  pipelineConfigSchema,
  validateConfig,
} from './schema.js';
export type { PipelineConfigInput } from './schema.js';
