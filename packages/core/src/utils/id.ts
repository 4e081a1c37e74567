// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a conversation session ID with "ses_" prefix. */
export function generateSessionId(): string {
  return `ses_${nanoid(21)}`;
}

/** Generate a per-message run ID with "run_" prefix. */
export function generateRunId(): string {
  return `run_${nanoid(16)}`;
}

/** Generate a generic unique ID. */
export function generateId(prefix?: string): string {
  const id = nanoid(16);
  return prefix ? `${prefix}_${id}` : id;
}
