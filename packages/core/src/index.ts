// @saucier/core - Conversational chef pipeline
// classify -> persona -> route -> generate <-> quality gate -> format

export const VERSION = '0.1.0';

// Type definitions
export * from './types/index.js';

// Utilities
export * from './utils/index.js';

// Configuration
export * from './config/index.js';

// Per-run state record
export * from './state/index.js';

// Intent classification and entity extraction
export * from './classification/index.js';

// Persona, romantic rewriting and motif integration
export * from './persona/index.js';

// Quality scoring
export * from './scoring/index.js';

// Culinary knowledge base
export * from './knowledge/index.js';

// Image requests and generation
export * from './image/index.js';

// Model adapters
export * from './models/index.js';

// Session memory
export * from './memory/index.js';

// Stages
export * from './stages/index.js';

// Engine
export * from './engine/index.js';
