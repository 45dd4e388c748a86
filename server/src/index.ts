import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createGenerateRoutes } from './routes/generate.js';
import { createSessionRoutes } from './routes/sessions.js';
import { createPipelineOrchestrator } from './agents/pipeline.js';
import type { PipelineOrchestrator } from './agents/pipeline.js';
import { loadConfig } from './lib/config.js';
import type { AppConfig } from './lib/config.js';
import { getActiveSessionCount } from './lib/session-lock.js';
import { createLLMProvider } from './lib/llm.js';
import { selectSessionStore } from './sessions/index.js';
import type { SessionStore } from './sessions/types.js';
import { createDefaultTools } from './tools/index.js';
import logger from './lib/logger.js';

export interface AppDeps {
  config: AppConfig;
  store: SessionStore;
  orchestrator: PipelineOrchestrator;
}

export function createApp(deps: AppDeps) {
  const { config, store, orchestrator } = deps;
  const app = new Hono();
  const isProduction = config.env === 'production';
  const startTime = Date.now();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.use('*', cors({
    origin: config.allowedOrigins,
    allowMethods: ['GET', 'POST', 'OPTIONS'],
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: 'ok',
      session_store: store.kind,
      active_runs: getActiveSessionCount(),
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
    });
  });

  const generate = createGenerateRoutes({ orchestrator, rateLimit: config.rateLimit });
  app.route('/api/generate', generate);
  // Legacy unprefixed path used by existing frontends.
  app.route('/generate', generate);
  app.route('/api/sessions', createSessionRoutes({ store, orchestrator, rateLimit: config.rateLimit }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({
      status: 'error',
      message: isProduction ? 'Internal server error' : err.message,
      request_id: requestId,
    }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string, store: SessionStore) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Close HTTP server (stop accepting new connections)
  server.close(() => {
    void store.close()
      .catch((err: unknown) => {
        logger.warn({ err }, 'Session store did not close cleanly');
      })
      .finally(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      });
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer(env: NodeJS.ProcessEnv = process.env) {
  if (server) return server;

  const config = loadConfig(env);
  const store = selectSessionStore(config.session, logger);
  const llm = createLLMProvider(env);
  const tools = createDefaultTools(llm, logger, env);
  const orchestrator = createPipelineOrchestrator(config, store, tools);
  const app = createApp({ config, store, orchestrator });

  if (config.env === 'production' && config.allowedOrigins.length === 0) {
    logger.error('ALLOWED_ORIGINS not set in production, all cross-origin requests will be blocked');
  }

  logger.info({ port: config.port, store: store.kind, llm: llm.name }, 'Hotel post server starting');
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM', store));
  process.on('SIGINT', () => shutdown('SIGINT', store));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION', store);
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION', store);
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
