import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Hono } from 'hono';
import { rateLimitMiddleware, resetRateLimitStateForTests } from '../middleware/rate-limit.js';

function buildApp(maxRequests: number, windowMs: number) {
  const app = new Hono();
  app.use('/limited/*', rateLimitMiddleware(maxRequests, windowMs));
  app.post('/limited/a', (c) => c.json({ ok: true }));
  app.post('/limited/b', (c) => c.json({ ok: true }));
  return app;
}

describe('rateLimitMiddleware', () => {
  beforeEach(() => {
    resetRateLimitStateForTests();
    vi.useRealTimers();
    vi.unstubAllEnvs();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
  });

  it('keeps a separate bucket per route', async () => {
    const app = buildApp(1, 10_000);

    const aFirst = await app.request('http://test/limited/a', { method: 'POST' });
    const bFirst = await app.request('http://test/limited/b', { method: 'POST' });
    const aSecond = await app.request('http://test/limited/a', { method: 'POST' });

    expect(aFirst.status).toBe(200);
    expect(bFirst.status).toBe(200);
    expect(aSecond.status).toBe(429);
    expect(await aSecond.json()).toEqual({
      status: 'error',
      message: 'Too many requests. Please try again later.',
    });
  });

  it('reports remaining requests in headers', async () => {
    const app = buildApp(3, 10_000);

    const first = await app.request('http://test/limited/a', { method: 'POST' });
    const second = await app.request('http://test/limited/a', { method: 'POST' });

    expect(first.headers.get('X-RateLimit-Limit')).toBe('3');
    expect(first.headers.get('X-RateLimit-Remaining')).toBe('2');
    expect(second.headers.get('X-RateLimit-Remaining')).toBe('1');
  });

  it('returns Retry-After and resets after fixed window', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-02-20T21:00:00.000Z'));

    const app = buildApp(2, 1_000);

    const first = await app.request('http://test/limited/a', { method: 'POST' });
    const second = await app.request('http://test/limited/a', { method: 'POST' });
    const third = await app.request('http://test/limited/a', { method: 'POST' });

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
    expect(third.status).toBe(429);
    expect(third.headers.get('Retry-After')).toBe('1');

    vi.advanceTimersByTime(1_001);

    const afterReset = await app.request('http://test/limited/a', { method: 'POST' });
    expect(afterReset.status).toBe(200);
  });

  it('keys by forwarded client address behind a trusted proxy', async () => {
    vi.stubEnv('TRUST_PROXY', 'true');
    const app = buildApp(1, 10_000);

    const clientA = await app.request('http://test/limited/a', {
      method: 'POST',
      headers: { 'x-forwarded-for': '203.0.113.5, 10.0.0.1' },
    });
    const clientB = await app.request('http://test/limited/a', {
      method: 'POST',
      headers: { 'x-forwarded-for': '203.0.113.9' },
    });
    const clientAAgain = await app.request('http://test/limited/a', {
      method: 'POST',
      headers: { 'x-forwarded-for': '203.0.113.5' },
    });

    expect(clientA.status).toBe(200);
    expect(clientB.status).toBe(200);
    expect(clientAAgain.status).toBe(429);
  });
});
