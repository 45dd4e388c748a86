import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5-20250929';
export const DEFAULT_COPYWRITER_MODEL = 'google/gemini-2.5-flash-lite';
export const DEFAULT_MAX_TOKENS = 4096;

function positiveInt(fallback: number) {
  return z.coerce.number().int().positive().default(fallback);
}

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: positiveInt(3001),
  ALLOWED_ORIGINS: z.string().optional(),

  // Session storage
  SESSION_STORE: z.enum(['auto', 'sqlite', 'memory']).default('auto'),
  SESSION_DB_PATH: z.string().min(1).default('./data/sessions.db'),
  SESSION_APP_NAME: z.string().min(1).default('hotel_post_factory'),
  SESSION_COMPACTION_THRESHOLD: positiveInt(50),
  SESSION_COMPACTION_RETAIN: positiveInt(10),

  // Copywriting model
  ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_ANTHROPIC_MODEL),
  LLM_MODEL_COPYWRITER: z.string().min(1).default(DEFAULT_COPYWRITER_MODEL),
  MAX_TOKENS: positiveInt(DEFAULT_MAX_TOKENS),

  // Tool calls
  TOOL_TIMEOUT_MS: positiveInt(60_000),
  TOOL_MAX_ATTEMPTS: positiveInt(3),
  TOOL_RETRY_BASE_DELAY_MS: positiveInt(1_000),
  IMAGE_ANALYSIS_CONCURRENCY: positiveInt(4),
  MAX_LISTING_IMAGES: positiveInt(10),
  COPYWRITING_FOLLOW_UP_ATTEMPTS: z.coerce.number().int().min(0).default(1),

  // HTTP guards
  GENERATE_RATE_LIMIT_MAX: positiveInt(5),
  GENERATE_RATE_LIMIT_WINDOW_MS: positiveInt(60_000),
});

export type Env = z.infer<typeof EnvSchema>;

/** Copywriting model per provider: Anthropic, or any OpenAI-compatible endpoint. */
export interface CopywriterModels {
  anthropic: string;
  openaiCompatible: string;
}

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  allowedOrigins: string[];
  session: {
    store: Env['SESSION_STORE'];
    dbPath: string;
    appName: string;
    compaction: { threshold: number; retain: number };
  };
  copywriting: {
    models: CopywriterModels;
    maxTokens: number;
  };
  tools: {
    timeoutMs: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
  };
  pipeline: {
    imageConcurrency: number;
    maxImages: number;
    followUpAttempts: number;
  };
  rateLimit: { max: number; windowMs: number };
}

const DEV_ORIGINS = ['http://localhost:5173', 'http://127.0.0.1:5173'];

/**
 * Parse and validate environment configuration once at startup.
 * Empty strings count as unset so `.env` templates with blank values fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }
  const e = parsed.data;

  const allowedOrigins = e.ALLOWED_ORIGINS
    ? e.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
    : e.NODE_ENV === 'production'
      ? []
      : DEV_ORIGINS;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    allowedOrigins,
    session: {
      store: e.SESSION_STORE,
      dbPath: e.SESSION_DB_PATH,
      appName: e.SESSION_APP_NAME,
      compaction: {
        threshold: e.SESSION_COMPACTION_THRESHOLD,
        retain: Math.min(e.SESSION_COMPACTION_RETAIN, e.SESSION_COMPACTION_THRESHOLD),
      },
    },
    copywriting: {
      models: { anthropic: e.ANTHROPIC_MODEL, openaiCompatible: e.LLM_MODEL_COPYWRITER },
      maxTokens: e.MAX_TOKENS,
    },
    tools: {
      timeoutMs: e.TOOL_TIMEOUT_MS,
      maxAttempts: e.TOOL_MAX_ATTEMPTS,
      retryBaseDelayMs: e.TOOL_RETRY_BASE_DELAY_MS,
    },
    pipeline: {
      imageConcurrency: e.IMAGE_ANALYSIS_CONCURRENCY,
      maxImages: e.MAX_LISTING_IMAGES,
      followUpAttempts: e.COPYWRITING_FOLLOW_UP_ATTEMPTS,
    },
    rateLimit: {
      max: e.GENERATE_RATE_LIMIT_MAX,
      windowMs: e.GENERATE_RATE_LIMIT_WINDOW_MS,
    },
  };
}
