import logger from './logger.js';
import { SessionBusyError } from './errors.js';

const POLL_INTERVAL_MS = 100;

/** Sessions with an active run in this process, mapped to when the run started. */
const activeSessions = new Map<string, number>();

function tryAcquire(sessionId: string): boolean {
  if (activeSessions.has(sessionId)) return false;
  activeSessions.set(sessionId, Date.now());
  return true;
}

function release(sessionId: string): void {
  activeSessions.delete(sessionId);
}

/**
 * Waits until the session lock can be acquired, polling every 100ms.
 * With `maxWaitMs` of 0 the call fails immediately when the session is busy.
 */
async function waitForLock(sessionId: string, maxWaitMs: number): Promise<void> {
  const deadline = Date.now() + maxWaitMs;

  while (!tryAcquire(sessionId)) {
    if (Date.now() >= deadline) {
      throw new SessionBusyError(sessionId);
    }
    logger.debug({ sessionId }, 'Session is locked, waiting...');
    await new Promise((resolve) => setTimeout(resolve, POLL_INTERVAL_MS));
  }
}

export function isSessionLocked(sessionId: string): boolean {
  return activeSessions.has(sessionId);
}

export function getActiveSessionCount(): number {
  return activeSessions.size;
}

/**
 * Executes fn() while holding the in-process lock for `sessionId`, so a
 * session never has two runs writing to it at once. Unrelated sessions do not
 * contend with each other.
 */
export async function withSessionLock<T>(
  sessionId: string,
  fn: () => Promise<T>,
  options?: { maxWaitMs?: number },
): Promise<T> {
  await waitForLock(sessionId, options?.maxWaitMs ?? 0);
  try {
    return await fn();
  } finally {
    release(sessionId);
  }
}
