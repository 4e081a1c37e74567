// packages/core/src/scoring/quality-scorer.ts

import type { PersonaDimensions } from '../types/persona.js';
import type {
  QualityCheckResult,
  QualitySubScores,
  QualityWeights,
} from '../types/workflow.js';
import { loadScoringVocabulary, type ScoringVocabulary } from './vocabulary.js';

export interface ScoringSettings {
  threshold: number;
  weights: QualityWeights;
}

/** Scores a draft. Swappable so the gate can be driven by other heuristics. */
export interface QualityScorer {
  score(content: string, dimensions: PersonaDimensions, settings: ScoringSettings): QualityCheckResult;
}

/** Obsession level at which the consistency check insists on the motif. */
const MOTIF_REQUIRED_LEVEL = 8;
const PERSONA_ISSUE_BELOW = 0.8;
const MOTIF_ISSUE_BELOW = 0.3;
const ROMANCE_ISSUE_BELOW = 0.4;
const ISSUE_LEVEL = 7;

function containsAny(lowered: string, words: readonly string[]): boolean {
  return words.some((w) => lowered.includes(w));
}

function countFound(lowered: string, words: readonly string[]): number {
  return words.filter((w) => lowered.includes(w)).length;
}

/**
 * Keyword heuristics for persona voice, motif presence and romantic density.
 * The combined score is the plain weighted sum of the three sub-scores.
 */
export class HeuristicQualityScorer implements QualityScorer {
  constructor(private readonly vocabulary: ScoringVocabulary = loadScoringVocabulary()) {}

  score(content: string, dimensions: PersonaDimensions, settings: ScoringSettings): QualityCheckResult {
    const subScores: QualitySubScores = {
      personaConsistency: this.personaConsistency(content, dimensions),
      motifIntegration: this.motifIntegration(content, dimensions.motifObsession),
      romanticDensity: this.romanticDensity(content),
    };
    const { weights } = settings;
    const score =
      subScores.personaConsistency * weights.persona +
      subScores.motifIntegration * weights.motif +
      subScores.romanticDensity * weights.romance;

    const issues: string[] = [];
    const suggestions: string[] = [];
    if (subScores.personaConsistency < PERSONA_ISSUE_BELOW) {
      issues.push('Persona voice is inconsistent');
      suggestions.push('Lean into passionate, dramatic storytelling about the food');
    }
    if (subScores.motifIntegration < MOTIF_ISSUE_BELOW && dimensions.motifObsession >= ISSUE_LEVEL) {
      issues.push('Tomatoes are missing for a tomato-obsessed chef');
      suggestions.push('Weave ripe tomatoes naturally into the answer');
    }
    if (subScores.romanticDensity < ROMANCE_ISSUE_BELOW && dimensions.romanticIntensity >= ISSUE_LEVEL) {
      issues.push('Romantic language is too sparse');
      suggestions.push('Use warmer, more romantic vocabulary (heart, soul, embrace)');
    }

    return {
      passed: score >= settings.threshold,
      score,
      threshold: settings.threshold,
      subScores,
      issues,
      suggestions,
      checkedAt: new Date().toISOString(),
    };
  }

  /** Share of the six persona characteristics present in the text. */
  personaConsistency(content: string, dimensions: PersonaDimensions): number {
    const lowered = content.toLowerCase();
    const { characteristics, motif } = this.vocabulary;
    const checks = [
      containsAny(lowered, characteristics.passion),
      containsAny(lowered, characteristics.cooking),
      containsAny(lowered, characteristics.romantic),
      containsAny(lowered, characteristics.storytelling),
      containsAny(lowered, characteristics.drama),
      dimensions.motifObsession >= MOTIF_REQUIRED_LEVEL ? lowered.includes(motif.word) : true,
    ];
    return checks.filter(Boolean).length / checks.length;
  }

  motifIntegration(content: string, obsessionLevel: number): number {
    const lowered = content.toLowerCase();
    const { motif } = this.vocabulary;
    let score = 0;
    if (lowered.includes(motif.word)) {
      score += 0.5;
    }
    score += Math.min(0.2, 0.05 * countFound(lowered, motif.varieties));
    score += Math.min(0.25, 0.05 * countFound(lowered, motif.related));
    const obsessionShare = countFound(lowered, motif.obsession) / motif.obsession.length;
    score += obsessionShare * (obsessionLevel / 10) * 0.3;
    return Math.min(score, 1);
  }

  romanticDensity(content: string): number {
    return Math.min(countFound(content.toLowerCase(), this.vocabulary.romanticTerms) / 10, 1);
  }

  /** Romantic terms present in the text, in vocabulary order. */
  romanticElements(content: string): string[] {
    const lowered = content.toLowerCase();
    return this.vocabulary.romanticTerms.filter((t) => lowered.includes(t));
  }
}
