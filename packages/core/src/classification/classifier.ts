// packages/core/src/classification/classifier.ts

import type { ImageDetails, ImageStyle } from '../types/image.js';
import type {
  Classification,
  ContentCategory,
  ExtractedEntities,
  ProcessingPriority,
} from '../types/workflow.js';
import { DEFAULT_CLASSIFICATION_CONFIDENCE } from '../utils/constants.js';
import { type ClassifierTables, loadClassifierTables } from './vocabulary.js';

export interface IntentMatch {
  category: ContentCategory;
  confidence: number;
}

interface CompiledIntent {
  category: ContentCategory;
  patterns: RegExp[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Keyword and regex intent classifier. Pure and deterministic: the same
 * text always yields the same category, confidence and entities.
 */
export class Classifier {
  private readonly intents: CompiledIntent[];
  private readonly urgentPattern: RegExp;
  /** Longest first so "create an image of" wins over "image of". */
  private readonly imagePrefixes: string[];

  constructor(private readonly tables: ClassifierTables = loadClassifierTables()) {
    this.intents = tables.intentPatterns.map((entry) => ({
      category: entry.category,
      patterns: entry.patterns.map((p) => new RegExp(p)),
    }));
    this.urgentPattern = new RegExp(
      `\\b(${tables.urgentKeywords.map(escapeRegExp).join('|')})\\b`,
    );
    this.imagePrefixes = [...tables.imagePrefixes].sort((a, b) => b.length - a.length);
  }

  classify(text: string): Classification {
    const { category, confidence } = this.classifyIntent(text);
    return {
      category,
      confidence,
      entities: this.extractEntities(text, category),
      priority: this.determinePriority(text, category),
    };
  }

  /**
   * Score each category by the share of its patterns that match. Highest
   * share wins; ties keep table order. No match falls back to general chat.
   */
  classifyIntent(text: string): IntentMatch {
    const lowered = text.toLowerCase();
    let best: IntentMatch | null = null;
    for (const intent of this.intents) {
      const matches = intent.patterns.filter((p) => p.test(lowered)).length;
      if (matches === 0) {
        continue;
      }
      const score = matches / intent.patterns.length;
      if (best === null || score > best.confidence) {
        best = { category: intent.category, confidence: Math.min(score, 1) };
      }
    }
    return best ?? { category: 'general_chat', confidence: DEFAULT_CLASSIFICATION_CONFIDENCE };
  }

  extractEntities(text: string, category: ContentCategory): ExtractedEntities {
    const lowered = text.toLowerCase();
    const { vocabularies } = this.tables;
    const found = (vocab: string[]): string[] => vocab.filter((word) => lowered.includes(word));
    return {
      ingredients: found(vocabularies.ingredients),
      techniques: found(vocabularies.techniques),
      cuisines: found(vocabularies.cuisines),
      dietary: found(vocabularies.dietary),
      image: category === 'image_request' ? this.extractImageDetails(text) : null,
    };
  }

  extractImageDetails(text: string): ImageDetails {
    const trimmed = text.trim();
    const lowered = trimmed.toLowerCase();
    const prefix = this.imagePrefixes.find((p) => lowered.startsWith(p));
    const description = (prefix ? trimmed.slice(prefix.length) : trimmed)
      .trim()
      .replace(/[.!?]+$/, '');
    return {
      description,
      style: this.detectStyle(lowered),
      includeMotif: !this.tables.motifOptOutPhrases.some((phrase) => lowered.includes(phrase)),
    };
  }

  determinePriority(text: string, category: ContentCategory): ProcessingPriority {
    if (this.urgentPattern.test(text.toLowerCase())) {
      return 'urgent';
    }
    if (this.tables.highPriorityCategories.includes(category)) {
      return 'high';
    }
    return 'normal';
  }

  private detectStyle(lowered: string): ImageStyle | null {
    const entry = this.tables.imageStyleKeywords.find((s) =>
      s.keywords.some((keyword) => lowered.includes(keyword)),
    );
    return entry?.style ?? null;
  }
}

/** Collapse whitespace and trim. */
export function normalizeInput(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}
