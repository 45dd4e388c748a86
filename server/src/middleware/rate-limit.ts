import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const MAX_RATE_LIMIT_BUCKETS = 10_000;

const buckets = new Map<string, RateLimitEntry>();

// Cleanup expired entries every 60 seconds
const cleanupTimer = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of buckets) {
    if (now >= entry.resetAt) {
      buckets.delete(key);
    }
  }
}, 60_000);
cleanupTimer.unref();

// Test-only helper to avoid cross-test leakage from module-level state.
export function resetRateLimitStateForTests() {
  buckets.clear();
}

function trimKeySegment(value: string, maxLen = 128): string {
  const trimmed = value.trim();
  return trimmed.length > maxLen ? trimmed.slice(0, maxLen) : trimmed;
}

function clientIdentifier(c: Context, scope: string): string {
  if (process.env.TRUST_PROXY === 'true') {
    const forwarded = trimKeySegment(c.req.header('x-forwarded-for')?.split(',')[0] ?? 'anonymous');
    return `ip:${forwarded}:${scope}`;
  }
  return `anonymous:${scope}`;
}

/**
 * Fixed-window rate limiter keyed by client IP (behind a trusted proxy) and route.
 * @param maxRequests - Max requests allowed in the window
 * @param windowMs - Window duration in milliseconds
 */
export function rateLimitMiddleware(maxRequests: number, windowMs: number) {
  return async (c: Context, next: Next) => {
    const scope = `${c.req.method}:${c.req.path}`;
    const key = clientIdentifier(c, scope);
    const now = Date.now();
    let entry = buckets.get(key);

    if (!entry || now >= entry.resetAt) {
      // Keep memory bounded under key-space abuse.
      while (buckets.size >= MAX_RATE_LIMIT_BUCKETS) {
        const oldest = buckets.keys().next().value;
        if (oldest === undefined) break;
        buckets.delete(oldest);
      }
      entry = { count: 0, resetAt: now + windowMs };
      buckets.set(key, entry);
    }

    entry.count++;
    const resetSeconds = Math.max(1, Math.ceil((entry.resetAt - now) / 1000));
    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(resetSeconds));

    if (entry.count > maxRequests) {
      c.header('Retry-After', String(resetSeconds));
      logger.warn({ key, scope, count: entry.count, max: maxRequests }, 'Rate limit exceeded');
      return c.json({ status: 'error', message: 'Too many requests. Please try again later.' }, 429);
    }

    await next();
  };
}
