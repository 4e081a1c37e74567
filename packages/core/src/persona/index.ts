// packages/core/src/persona/index.ts

export { PersonaEngine } from './persona-engine.js';
export type { MoodCandidate } from './persona-engine.js';
export { RomanticWriter } from './romantic-writer.js';
export { MotifIntegrator } from './motif-integrator.js';
export {
  fillTemplate,
  loadPersonaTemplates,
  personaTemplatesSchema,
  romanticStyleSchema,
} from './templates.js';
export type { PersonaTemplates, RomanticStyle } from './templates.js';
export { buildSystemPrompt, buildUserPrompt, renderGenerationPrompt } from './prompts.js';
export type { GenerationPromptVariables } from './prompts.js';
