// packages/core/src/types/knowledge.ts

export type KnowledgeKind = 'ingredient' | 'technique' | 'cuisine';

export interface KnowledgeRecord {
  kind: KnowledgeKind;
  name: string;
  aliases: string[];
  flavorProfile: string[];
  pairings: string[];
  substitutions: string[];
  notes: string;
}
