// packages/core/src/utils/data.ts -- Loads the JSON tables shipped in packages/core/data

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import { ConfigError } from './errors.js';

const currentDir = dirname(fileURLToPath(import.meta.url));
const DATA_DIR = resolve(currentDir, '../../data');

/** Read `data/<file>` and validate it against a schema. */
export function loadDataFile<T extends z.ZodTypeAny>(file: string, schema: T): z.output<T> {
  const path = resolve(DATA_DIR, file);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to read data file ${file}: ${err instanceof Error ? err.message : String(err)}`,
      file,
    );
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid data file ${file}: ${issues}`, file);
  }
  return result.data;
}
