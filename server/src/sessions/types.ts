import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import type { PipelineStageName } from '../lib/errors.js';

export type SessionEventType =
  | 'session_created'
  | 'stage_start'
  | 'stage_complete'
  | 'stage_failed'
  | 'state_update'
  | 'degraded'
  | 'copywriting_raw'
  | 'run_complete'
  | 'run_failed'
  | 'compaction';

export interface SessionEvent {
  id: string;
  type: SessionEventType;
  stage?: PipelineStageName;
  timestamp: string;
  data?: Record<string, unknown>;
}

/** Event as supplied by callers; the store assigns `id` and `timestamp`. */
export type NewSessionEvent = Omit<SessionEvent, 'id' | 'timestamp'>;

export type SessionState = Record<string, unknown>;

export interface Session {
  id: string;
  app_name: string;
  created_at: string;
  updated_at: string;
  events: SessionEvent[];
  state: SessionState;
}

export interface SessionSummary {
  id: string;
  created_at: string;
  updated_at: string;
  event_count: number;
  state_keys: string[];
}

export interface CreateSessionOptions {
  session_id?: string;
  initial_state?: SessionState;
}

export interface CompactionPolicy {
  threshold: number;
  retain: number;
}

/**
 * Capability shared by the durable and volatile session backends. Writes to a
 * single session are applied one at a time; unrelated sessions never wait on
 * each other.
 */
export interface SessionStore {
  readonly kind: 'durable' | 'volatile';
  createSession(options?: CreateSessionOptions): Promise<string>;
  getSession(sessionId: string): Promise<Session | null>;
  /** Throws SessionNotFoundError for unknown ids. */
  getState(sessionId: string): Promise<SessionState>;
  appendEvent(sessionId: string, event: NewSessionEvent): Promise<void>;
  /** Sets one state key and records a `state_update` event naming it. */
  mutateState(sessionId: string, key: string, value: unknown): Promise<void>;
  listSessions(limit?: number): Promise<SessionSummary[]>;
  close(): Promise<void>;
}

export function generateSessionId(): string {
  return `session_${randomBytes(8).toString('hex')}`;
}

export function generateEventId(): string {
  return `evt_${randomBytes(6).toString('hex')}`;
}

const EVENT_TYPES = [
  'session_created',
  'stage_start',
  'stage_complete',
  'stage_failed',
  'state_update',
  'degraded',
  'copywriting_raw',
  'run_complete',
  'run_failed',
  'compaction',
] as const satisfies readonly SessionEventType[];

const STAGE_NAMES = [
  'listing_scrape',
  'site_enrichment',
  'image_analysis',
  'copywriting',
] as const satisfies readonly PipelineStageName[];

export const sessionEventSchema = z.object({
  id: z.string(),
  type: z.enum(EVENT_TYPES),
  stage: z.enum(STAGE_NAMES).optional(),
  timestamp: z.string(),
  data: z.record(z.unknown()).optional(),
});

export const sessionEventsSchema = z.array(sessionEventSchema);

export const sessionStateSchema = z.record(z.unknown());
