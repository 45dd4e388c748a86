/**
 * Error taxonomy for the post generation pipeline.
 *
 * Every domain error carries a `category` so callers can branch on the kind
 * of failure without string matching. Fatal categories abort a run; the
 * degradable ones (`enrichment`, `vision`, `store_init`) are recorded and the
 * run continues with reduced data.
 */

export type ErrorCategory =
  | 'scrape'
  | 'enrichment'
  | 'vision'
  | 'generation'
  | 'normalization'
  | 'store_init'
  | 'session_not_found'
  | 'busy'
  | 'timeout'
  | 'cancelled'
  | 'config'
  | 'internal';

export type PipelineStageName = 'listing_scrape' | 'site_enrichment' | 'image_analysis' | 'copywriting';

export class AppError extends Error {
  constructor(
    public readonly category: ErrorCategory,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

export class ScrapeError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('scrape', message, options);
    this.name = 'ScrapeError';
  }
}

export class EnrichmentError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('enrichment', message, options);
    this.name = 'EnrichmentError';
  }
}

export class VisionError extends AppError {
  constructor(
    message: string,
    public readonly image_url: string,
    options?: { cause?: unknown },
  ) {
    super('vision', message, options);
    this.name = 'VisionError';
  }
}

export class GenerationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('generation', message, options);
    this.name = 'GenerationError';
  }
}

export class NormalizationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('normalization', message, options);
    this.name = 'NormalizationError';
  }
}

export class StoreInitError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store_init', message, options);
    this.name = 'StoreInitError';
  }
}

export class SessionNotFoundError extends AppError {
  constructor(public readonly session_id: string) {
    super('session_not_found', `Session ${session_id} not found`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionBusyError extends AppError {
  constructor(public readonly session_id: string) {
    super('busy', `Session ${session_id} already has an active run`);
    this.name = 'SessionBusyError';
  }
}

export class ToolTimeoutError extends AppError {
  constructor(
    public readonly tool: string,
    public readonly timeout_ms: number,
  ) {
    super('timeout', `${tool} timed out after ${timeout_ms}ms`);
    this.name = 'ToolTimeoutError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

/**
 * A fatal failure of one pipeline run. `cause` holds the underlying error;
 * `category` mirrors the cause's category, or `internal` for unknown errors.
 */
export class PipelineError extends AppError {
  constructor(
    public readonly stage: PipelineStageName | 'session',
    category: ErrorCategory,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(category, message, options);
    this.name = 'PipelineError';
  }

  static from(stage: PipelineStageName | 'session', cause: unknown): PipelineError {
    if (cause instanceof PipelineError) return cause;
    const category = cause instanceof AppError ? cause.category : 'internal';
    return new PipelineError(stage, category, `${stage} failed: ${errorMessage(cause)}`, { cause });
  }
}

export interface PublicError {
  stage: PipelineStageName | 'session';
  category: ErrorCategory;
  message: string;
}

const PUBLIC_MESSAGES: Record<ErrorCategory, string> = {
  scrape: 'Could not read a description and photos from the listing URL.',
  enrichment: 'The hotel website could not be searched.',
  vision: 'The listing photos could not be analyzed.',
  generation: 'The copywriting model did not produce usable posts.',
  normalization: 'The generated posts could not be understood.',
  store_init: 'Session storage is unavailable.',
  session_not_found: 'That session does not exist.',
  busy: 'This session is already being processed.',
  timeout: 'An upstream service took too long to respond.',
  cancelled: 'The request was cancelled.',
  config: 'The service is not configured correctly.',
  internal: 'Something went wrong while generating posts.',
};

/**
 * User-facing error payload. Messages come from a fixed table so upstream
 * error text (which may contain keys, hosts or file paths) never reaches the caller.
 */
export function toPublicError(err: PipelineError): PublicError {
  return {
    stage: err.stage,
    category: err.category,
    message: PUBLIC_MESSAGES[err.category],
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
