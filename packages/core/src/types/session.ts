// packages/core/src/types/session.ts

export type SkillLevel = 'beginner' | 'intermediate' | 'advanced' | 'professional';

export interface SessionPreferences {
  dietaryRestrictions: string[];
  skillLevel: SkillLevel;
  /** Ingredient name to affinity in [-1, 1]. */
  ingredientAffinities: Record<string, number>;
  favoriteCuisines: string[];
}

export type PreferencesUpdate = Partial<SessionPreferences>;

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  createdAt: string;
}

export interface ConversationContext {
  history: ConversationTurn[];
  preferences: SessionPreferences;
}

export interface RunRecord {
  runId: string;
  sessionId: string;
  category: string | null;
  success: boolean;
  degraded: boolean;
  qualityScore: number | null;
  regenerationCount: number;
  demoFallback: boolean;
  durationMs: number;
}

export interface WorkflowStats {
  totalRuns: number;
  successRate: number;
  errorRate: number;
  degradedRate: number;
  averageDurationMs: number;
  averageQualityScore: number | null;
  regenerationRate: number;
  demoFallbacks: number;
}
