import { Hono } from 'hono';
import type { PipelineOrchestrator } from '../agents/pipeline.js';
import { PipelineError, toPublicError } from '../lib/errors.js';
import { isSessionLocked } from '../lib/session-lock.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';
import type { SessionStore } from '../sessions/types.js';
import { pipelineErrorResponse } from './respond.js';

const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 100;
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export interface SessionRouteDeps {
  store: SessionStore;
  orchestrator: PipelineOrchestrator;
  rateLimit: { max: number; windowMs: number };
}

function parseLimit(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return DEFAULT_LIST_LIMIT;
  return Math.min(parsed, MAX_LIST_LIMIT);
}

export function createSessionRoutes(deps: SessionRouteDeps) {
  const sessions = new Hono();

  // GET /api/sessions?limit=20 (most recently updated first)
  sessions.get('/', async (c) => {
    const list = await deps.store.listSessions(parseLimit(c.req.query('limit')));
    return c.json({ sessions: list, store: deps.store.kind });
  });

  // GET /api/sessions/:id: full state, event log, and whether a run is in progress
  sessions.get('/:id', async (c) => {
    const id = c.req.param('id');
    if (!SESSION_ID_PATTERN.test(id)) {
      return c.json({ status: 'error', message: 'Invalid session id' }, 400);
    }
    const session = await deps.store.getSession(id);
    if (!session) {
      return c.json({ status: 'error', message: 'Session not found' }, 404);
    }
    return c.json({ session, running: isSessionLocked(id) });
  });

  // POST /api/sessions/:id/resume: re-run the stages that have no stored output
  sessions.post('/:id/resume', rateLimitMiddleware(deps.rateLimit.max, deps.rateLimit.windowMs), async (c) => {
    const id = c.req.param('id');
    if (!SESSION_ID_PATTERN.test(id)) {
      return c.json({ status: 'error', message: 'Invalid session id' }, 400);
    }

    try {
      const posts = await deps.orchestrator.resume(id, { signal: c.req.raw.signal });
      return c.json({ status: 'success', session_id: id, data: posts });
    } catch (err) {
      const error = PipelineError.from('session', err);
      c.get('log').warn({ session_id: id, stage: error.stage, category: error.category }, 'Resume failed');
      return pipelineErrorResponse(c, id, toPublicError(error));
    }
  });

  return sessions;
}
