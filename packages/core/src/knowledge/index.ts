// packages/core/src/knowledge/index.ts

export { KnowledgeBase, knowledgeFileSchema } from './knowledge-base.js';
export type { KnowledgeFile } from './knowledge-base.js';
