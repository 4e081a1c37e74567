// packages/core/src/utils/index.ts -- barrel re-export

export { generateSessionId, generateRunId, generateId } from './id.js';
export {
  ConfigError,
  ValidationError,
  WorkflowError,
  DatabaseError,
  RateLimitError,
  TimeoutError,
  ConnectionError,
  ApiError,
  RECOVERABLE_ERROR_NAMES,
  isRecoverableError,
  errorMessage,
  errorName,
} from './errors.js';
export { createLogger, isLogLevel, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { mulberry32, mathRandom, pick } from './random.js';
export type { Rng } from './random.js';
export { withTimeout } from './timeout.js';
export { loadDataFile } from './data.js';
export * from './constants.js';
