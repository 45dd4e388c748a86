import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { AppError, SessionNotFoundError, StoreInitError, errorMessage } from '../lib/errors.js';
import { compactEvents } from './compaction.js';
import {
  generateEventId,
  generateSessionId,
  sessionEventsSchema,
  sessionStateSchema,
} from './types.js';
import type {
  CompactionPolicy,
  CreateSessionOptions,
  NewSessionEvent,
  Session,
  SessionEvent,
  SessionState,
  SessionStore,
  SessionSummary,
} from './types.js';

const BUSY_TIMEOUT_MS = 5_000;

const REQUIRED_COLUMNS = ['id', 'app_name', 'created_at', 'updated_at', 'state_json', 'events_json'];

const columnSchema = z.array(z.object({ name: z.string() }));

const sessionRowSchema = z.object({
  id: z.string(),
  app_name: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  state_json: z.string(),
  events_json: z.string(),
});

type SessionRow = z.infer<typeof sessionRowSchema>;

const summaryRowSchema = z.object({
  id: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  state_json: z.string(),
  events_json: z.string(),
});

function parseJsonColumn<T>(raw: string, schema: z.ZodType<T>, column: string, sessionId: string): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new AppError('internal', `Session ${sessionId} has unreadable ${column}`, { cause: err });
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new AppError('internal', `Session ${sessionId} has malformed ${column}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Durable session backend: one row per session holding the state snapshot and
 * event log as JSON, so new state keys never need a migration. Rows belong to
 * one app name and are invisible to handles opened for another. WAL journaling
 * lets concurrent handles read while one writes; every mutation runs in an
 * IMMEDIATE transaction so read-modify-write on a row is serialized.
 */
export class SqliteSessionStore implements SessionStore {
  readonly kind = 'durable' as const;

  private constructor(
    private readonly db: Database.Database,
    private readonly appName: string,
    private readonly compaction: CompactionPolicy,
  ) {}

  /**
   * Open (and create if needed) the database at `dbPath`. Any failure, from an
   * unwritable directory to a table with the wrong shape, surfaces as StoreInitError.
   */
  static open(dbPath: string, appName: string, compaction: CompactionPolicy): SqliteSessionStore {
    let db: Database.Database | null = null;
    try {
      if (dbPath !== ':memory:') {
        mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
      }
      db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      db.exec(`
        CREATE TABLE IF NOT EXISTS sessions (
          id TEXT PRIMARY KEY,
          app_name TEXT NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          state_json TEXT NOT NULL DEFAULT '{}',
          events_json TEXT NOT NULL DEFAULT '[]'
        )
      `);

      const columns = columnSchema.parse(db.prepare('PRAGMA table_info(sessions)').all()).map((c) => c.name);
      const missing = REQUIRED_COLUMNS.filter((name) => !columns.includes(name));
      if (missing.length > 0) {
        throw new Error(`sessions table is missing columns: ${missing.join(', ')}`);
      }
      return new SqliteSessionStore(db, appName, compaction);
    } catch (err) {
      db?.close();
      throw new StoreInitError(`Could not open session database at ${dbPath}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async createSession(options?: CreateSessionOptions): Promise<string> {
    const id = options?.session_id ?? generateSessionId();
    const now = new Date().toISOString();
    const events: SessionEvent[] = [{ id: generateEventId(), type: 'session_created', timestamp: now }];

    const insert = this.db.transaction(() => {
      const exists = this.db.prepare<[string], { id: string }>('SELECT id FROM sessions WHERE id = ?').get(id);
      if (exists) throw new AppError('internal', `Session ${id} already exists`);
      this.db
        .prepare<[string, string, string, string, string, string]>(
          `INSERT INTO sessions (id, app_name, created_at, updated_at, state_json, events_json)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(id, this.appName, now, now, JSON.stringify(options?.initial_state ?? {}), JSON.stringify(events));
    });
    insert.immediate();
    return id;
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const row = this.readRow(sessionId);
    if (!row) return null;
    return {
      id: row.id,
      app_name: row.app_name,
      created_at: row.created_at,
      updated_at: row.updated_at,
      state: parseJsonColumn(row.state_json, sessionStateSchema, 'state_json', sessionId),
      events: parseJsonColumn(row.events_json, sessionEventsSchema, 'events_json', sessionId),
    };
  }

  async getState(sessionId: string): Promise<SessionState> {
    const row = this.readRow(sessionId);
    if (!row) throw new SessionNotFoundError(sessionId);
    return parseJsonColumn(row.state_json, sessionStateSchema, 'state_json', sessionId);
  }

  async appendEvent(sessionId: string, event: NewSessionEvent): Promise<void> {
    this.update(sessionId, (_state, events, timestamp) => ({
      events: [...events, { ...event, id: generateEventId(), timestamp }],
    }));
  }

  async mutateState(sessionId: string, key: string, value: unknown): Promise<void> {
    this.update(sessionId, (state, events, timestamp) => ({
      state: { ...state, [key]: value },
      events: [...events, { id: generateEventId(), type: 'state_update', timestamp, data: { key } }],
    }));
  }

  async listSessions(limit = 20): Promise<SessionSummary[]> {
    const rows = z.array(summaryRowSchema).parse(
      this.db
        .prepare<[string, number]>(
          `SELECT id, created_at, updated_at, state_json, events_json FROM sessions
           WHERE app_name = ? ORDER BY updated_at DESC LIMIT ?`,
        )
        .all(this.appName, limit),
    );
    return rows.map((row) => ({
      id: row.id,
      created_at: row.created_at,
      updated_at: row.updated_at,
      event_count: parseJsonColumn(row.events_json, sessionEventsSchema, 'events_json', row.id).length,
      state_keys: Object.keys(parseJsonColumn(row.state_json, sessionStateSchema, 'state_json', row.id)),
    }));
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private readRow(sessionId: string): SessionRow | null {
    const raw = this.db
      .prepare<[string, string]>(
        `SELECT id, app_name, created_at, updated_at, state_json, events_json FROM sessions
         WHERE id = ? AND app_name = ?`,
      )
      .get(sessionId, this.appName);
    if (raw === undefined) return null;
    return sessionRowSchema.parse(raw);
  }

  private update(
    sessionId: string,
    apply: (
      state: SessionState,
      events: SessionEvent[],
      timestamp: string,
    ) => { state?: SessionState; events: SessionEvent[] },
  ): void {
    const tx = this.db.transaction(() => {
      const row = this.readRow(sessionId);
      if (!row) throw new SessionNotFoundError(sessionId);
      const state = parseJsonColumn(row.state_json, sessionStateSchema, 'state_json', sessionId);
      const events = parseJsonColumn(row.events_json, sessionEventsSchema, 'events_json', sessionId);
      const timestamp = new Date().toISOString();
      const next = apply(state, events, timestamp);
      this.db
        .prepare<[string, string, string, string, string]>(
          'UPDATE sessions SET state_json = ?, events_json = ?, updated_at = ? WHERE id = ? AND app_name = ?',
        )
        .run(
          JSON.stringify(next.state ?? state),
          JSON.stringify(compactEvents(next.events, this.compaction)),
          timestamp,
          sessionId,
          this.appName,
        );
    });
    tx.immediate();
  }
}
