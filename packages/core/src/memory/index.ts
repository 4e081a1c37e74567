// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { SessionStore } from './session-store.js';
export {
  DEFAULT_PREFERENCES,
  mergePreferences,
  parsePreferencesUpdate,
  preferencesUpdateSchema,
} from './preferences.js';
