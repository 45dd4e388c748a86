import type { Logger } from '../lib/logger.js';
import type { AppConfig } from '../lib/config.js';
import { StoreInitError } from '../lib/errors.js';
import { InMemorySessionStore } from './memory-session-store.js';
import { SqliteSessionStore } from './sqlite-session-store.js';
import type { SessionStore } from './types.js';

export { InMemorySessionStore } from './memory-session-store.js';
export { SqliteSessionStore } from './sqlite-session-store.js';
export { compactEvents, readCompactionData } from './compaction.js';
export type {
  CompactionPolicy,
  CreateSessionOptions,
  NewSessionEvent,
  Session,
  SessionEvent,
  SessionEventType,
  SessionState,
  SessionStore,
  SessionSummary,
} from './types.js';

/**
 * Pick the session backend once at startup.
 *
 * - `auto`: durable store, or the volatile store when it cannot be opened
 * - `sqlite`: durable store only; an open failure is rethrown
 * - `memory`: volatile store only
 */
export function selectSessionStore(config: AppConfig['session'], log: Logger): SessionStore {
  if (config.store === 'memory') {
    log.info({ store: 'memory' }, 'Using in-memory session store');
    return new InMemorySessionStore(config.appName, config.compaction);
  }

  try {
    const store = SqliteSessionStore.open(config.dbPath, config.appName, config.compaction);
    log.info({ store: 'sqlite', path: config.dbPath }, 'Using SQLite session store');
    return store;
  } catch (err) {
    if (config.store === 'sqlite' || !(err instanceof StoreInitError)) throw err;
    log.warn(
      { err, path: config.dbPath },
      'Durable session store unavailable, falling back to in-memory sessions',
    );
    return new InMemorySessionStore(config.appName, config.compaction);
  }
}
