// packages/core/src/classification/index.ts

export { Classifier, normalizeInput } from './classifier.js';
export type { IntentMatch } from './classifier.js';
export { classifierTablesSchema, loadClassifierTables } from './vocabulary.js';
export type { ClassifierTables } from './vocabulary.js';
