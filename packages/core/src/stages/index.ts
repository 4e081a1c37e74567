// packages/core/src/stages/index.ts

export { Stage } from './stage.js';
export { InputProcessorStage } from './input-processor.js';
export { PersonaFilterStage } from './persona-filter.js';
export { ContentRouterStage, buildProcessingFlags, makeRoutingDecision } from './content-router.js';
export { ResponseGeneratorStage } from './response-generator.js';
export type { ResponseGeneratorDeps } from './response-generator.js';
export { QualityValidatorStage, draftText } from './quality-validator.js';
export { OutputFormatterStage, buildOutputMetadata } from './output-formatter.js';
