// packages/core/src/memory/session-store.ts

import type Database from 'better-sqlite3';
import { storedPersonaSchema } from '../state/persona-state.js';
import type { PersonaState } from '../types/persona.js';
import type {
  ConversationTurn,
  PreferencesUpdate,
  RunRecord,
  SessionPreferences,
  TurnRole,
  WorkflowStats,
} from '../types/session.js';
import { DatabaseError } from '../utils/errors.js';
import { DEFAULT_PREFERENCES, mergePreferences, storedPreferencesSchema } from './preferences.js';

interface TurnRow {
  role: string;
  content: string;
  created_at: string;
}

interface StatsRow {
  total: number;
  successes: number | null;
  degraded: number | null;
  avg_duration: number | null;
  avg_quality: number | null;
  regenerated: number | null;
  demo_fallbacks: number | null;
}

function isTurnRole(value: string): value is TurnRole {
  return value === 'user' || value === 'assistant';
}

function parseJson(raw: string, column: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new DatabaseError(
      `Corrupt ${column} JSON: ${err instanceof Error ? err.message : String(err)}`,
      'read',
    );
  }
}

/** Session-keyed conversation memory: turns, preferences, persona and run log. */
export class SessionStore {
  constructor(private db: Database.Database) {}

  ensureSession(sessionId: string): void {
    this.db.prepare('INSERT OR IGNORE INTO sessions (id) VALUES (?)').run(sessionId);
  }

  appendTurn(sessionId: string, role: TurnRole, content: string): ConversationTurn {
    this.ensureSession(sessionId);
    const createdAt = new Date().toISOString();
    this.db
      .prepare('INSERT INTO turns (session_id, role, content, created_at) VALUES (?, ?, ?, ?)')
      .run(sessionId, role, content, createdAt);
    this.touch(sessionId);
    return { role, content, createdAt };
  }

  /** Turns in chronological order; with a limit, the most recent ones. */
  getHistory(sessionId: string, limit?: number): ConversationTurn[] {
    const rows =
      limit === undefined
        ? (this.db
            .prepare('SELECT role, content, created_at FROM turns WHERE session_id = ? ORDER BY id ASC')
            .all(sessionId) as TurnRow[])
        : (this.db
            .prepare(
              `SELECT role, content, created_at FROM (
                 SELECT id, role, content, created_at FROM turns WHERE session_id = ? ORDER BY id DESC LIMIT ?
               ) ORDER BY id ASC`,
            )
            .all(sessionId, limit) as TurnRow[]);
    return rows.flatMap((row) =>
      isTurnRole(row.role) ? [{ role: row.role, content: row.content, createdAt: row.created_at }] : [],
    );
  }

  getPreferences(sessionId: string): SessionPreferences {
    const row = this.db.prepare('SELECT preferences FROM sessions WHERE id = ?').get(sessionId) as
      | { preferences: string | null }
      | undefined;
    if (!row?.preferences) {
      return structuredClone(DEFAULT_PREFERENCES);
    }
    const parsed = storedPreferencesSchema.safeParse(parseJson(row.preferences, 'preferences'));
    if (!parsed.success) {
      throw new DatabaseError(`Stored preferences for ${sessionId} are invalid`, 'read');
    }
    return parsed.data;
  }

  mergePreferences(sessionId: string, update: PreferencesUpdate): SessionPreferences {
    return this.db.transaction(() => {
      this.ensureSession(sessionId);
      const merged = mergePreferences(this.getPreferences(sessionId), update);
      this.db
        .prepare('UPDATE sessions SET preferences = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?')
        .run(JSON.stringify(merged), sessionId);
      return merged;
    })();
  }

  getPersona(sessionId: string): PersonaState | null {
    const row = this.db.prepare('SELECT persona FROM sessions WHERE id = ?').get(sessionId) as
      | { persona: string | null }
      | undefined;
    if (!row?.persona) {
      return null;
    }
    const parsed = storedPersonaSchema.safeParse(parseJson(row.persona, 'persona'));
    if (!parsed.success) {
      throw new DatabaseError(`Stored persona for ${sessionId} is invalid`, 'read');
    }
    return parsed.data;
  }

  savePersona(sessionId: string, persona: PersonaState): void {
    this.ensureSession(sessionId);
    this.db
      .prepare('UPDATE sessions SET persona = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?')
      .run(JSON.stringify(persona), sessionId);
  }

  recordRun(record: RunRecord): void {
    this.ensureSession(record.sessionId);
    this.db
      .prepare(
        `INSERT INTO runs (id, session_id, category, success, degraded, quality_score, regeneration_count, demo_fallback, duration_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        record.runId,
        record.sessionId,
        record.category,
        record.success ? 1 : 0,
        record.degraded ? 1 : 0,
        record.qualityScore,
        record.regenerationCount,
        record.demoFallback ? 1 : 0,
        record.durationMs,
      );
  }

  getStats(): WorkflowStats {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS total,
                SUM(success) AS successes,
                SUM(degraded) AS degraded,
                AVG(duration_ms) AS avg_duration,
                AVG(quality_score) AS avg_quality,
                SUM(CASE WHEN regeneration_count > 0 THEN 1 ELSE 0 END) AS regenerated,
                SUM(demo_fallback) AS demo_fallbacks
         FROM runs`,
      )
      .get() as StatsRow;
    const total = row.total;
    const rate = (count: number | null): number => (total === 0 ? 0 : (count ?? 0) / total);
    return {
      totalRuns: total,
      successRate: rate(row.successes),
      errorRate: total === 0 ? 0 : 1 - rate(row.successes),
      degradedRate: rate(row.degraded),
      averageDurationMs: row.avg_duration ?? 0,
      averageQualityScore: row.avg_quality,
      regenerationRate: rate(row.regenerated),
      demoFallbacks: row.demo_fallbacks ?? 0,
    };
  }

  private touch(sessionId: string): void {
    this.db.prepare('UPDATE sessions SET updated_at = CURRENT_TIMESTAMP WHERE id = ?').run(sessionId);
  }
}
