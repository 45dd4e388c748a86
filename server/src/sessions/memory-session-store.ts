import { AppError, SessionNotFoundError } from '../lib/errors.js';
import { compactEvents } from './compaction.js';
import { generateEventId, generateSessionId } from './types.js';
import type {
  CompactionPolicy,
  CreateSessionOptions,
  NewSessionEvent,
  Session,
  SessionState,
  SessionStore,
  SessionSummary,
} from './types.js';

/**
 * Process-memory session backend. Everything is lost on restart; used when the
 * durable store cannot be opened and in tests.
 */
export class InMemorySessionStore implements SessionStore {
  readonly kind = 'volatile' as const;
  private readonly sessions = new Map<string, Session>();

  constructor(
    private readonly appName: string,
    private readonly compaction: CompactionPolicy,
  ) {}

  async createSession(options?: CreateSessionOptions): Promise<string> {
    const id = options?.session_id ?? generateSessionId();
    if (this.sessions.has(id)) {
      throw new AppError('internal', `Session ${id} already exists`);
    }
    const now = new Date().toISOString();
    this.sessions.set(id, {
      id,
      app_name: this.appName,
      created_at: now,
      updated_at: now,
      events: [{ id: generateEventId(), type: 'session_created', timestamp: now }],
      state: structuredClone(options?.initial_state ?? {}),
    });
    return id;
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async getState(sessionId: string): Promise<SessionState> {
    return structuredClone(this.require(sessionId).state);
  }

  async appendEvent(sessionId: string, event: NewSessionEvent): Promise<void> {
    const session = this.require(sessionId);
    this.push(session, event);
  }

  async mutateState(sessionId: string, key: string, value: unknown): Promise<void> {
    const session = this.require(sessionId);
    session.state[key] = structuredClone(value);
    this.push(session, { type: 'state_update', data: { key } });
  }

  async listSessions(limit = 20): Promise<SessionSummary[]> {
    return [...this.sessions.values()]
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .slice(0, limit)
      .map((s) => ({
        id: s.id,
        created_at: s.created_at,
        updated_at: s.updated_at,
        event_count: s.events.length,
        state_keys: Object.keys(s.state),
      }));
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }

  private require(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  private push(session: Session, event: NewSessionEvent): void {
    const timestamp = new Date().toISOString();
    session.events = compactEvents(
      [...session.events, { ...structuredClone(event), id: generateEventId(), timestamp }],
      this.compaction,
    );
    session.updated_at = timestamp;
  }
}
