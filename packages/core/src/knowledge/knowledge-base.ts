// packages/core/src/knowledge/knowledge-base.ts

import { z } from 'zod';
import type { KnowledgeKind, KnowledgeRecord } from '../types/knowledge.js';
import { loadDataFile } from '../utils/data.js';

const entrySchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  flavorProfile: z.array(z.string()).default([]),
  pairings: z.array(z.string()).default([]),
  substitutions: z.array(z.string()).default([]),
  notes: z.string().default(''),
});

export const knowledgeFileSchema = z.object({
  ingredients: z.array(entrySchema).default([]),
  techniques: z.array(entrySchema).default([]),
  cuisines: z.array(entrySchema).default([]),
});

export type KnowledgeFile = z.input<typeof knowledgeFileSchema>;

/** Read-only culinary reference. Lookups are case-insensitive and alias-aware. */
export class KnowledgeBase {
  private readonly index = new Map<string, KnowledgeRecord>();

  constructor(records: KnowledgeRecord[]) {
    for (const record of records) {
      for (const key of [record.name, ...record.aliases]) {
        const normalized = key.trim().toLowerCase();
        if (!this.index.has(normalized)) {
          this.index.set(normalized, record);
        }
      }
    }
  }

  static fromData(data: KnowledgeFile): KnowledgeBase {
    const parsed = knowledgeFileSchema.parse(data);
    const tag = (kind: KnowledgeKind, entries: z.output<typeof entrySchema>[]): KnowledgeRecord[] =>
      entries.map((entry) => ({ kind, ...entry }));
    return new KnowledgeBase([
      ...tag('ingredient', parsed.ingredients),
      ...tag('technique', parsed.techniques),
      ...tag('cuisine', parsed.cuisines),
    ]);
  }

  /** Knowledge base from data/knowledge.json. */
  static load(): KnowledgeBase {
    return KnowledgeBase.fromData(loadDataFile('knowledge.json', knowledgeFileSchema));
  }

  lookup(name: string): KnowledgeRecord | null {
    return this.index.get(name.trim().toLowerCase()) ?? null;
  }

  findPairings(ingredient: string): string[] {
    return this.lookup(ingredient)?.pairings ?? [];
  }

  /** Records for a list of names, de-duplicated, unknown names skipped. */
  lookupAll(names: string[]): KnowledgeRecord[] {
    const seen = new Set<KnowledgeRecord>();
    for (const name of names) {
      const record = this.lookup(name);
      if (record) {
        seen.add(record);
      }
    }
    return [...seen];
  }

  get size(): number {
    return new Set(this.index.values()).size;
  }
}
