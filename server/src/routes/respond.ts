import type { Context } from 'hono';
import type { ErrorCategory, PublicError } from '../lib/errors.js';

const STATUS_BY_CATEGORY = {
  scrape: 422,
  busy: 409,
  session_not_found: 404,
  cancelled: 503,
} as const satisfies Partial<Record<ErrorCategory, number>>;

type MappedStatus = (typeof STATUS_BY_CATEGORY)[keyof typeof STATUS_BY_CATEGORY] | 502;

export function statusForCategory(category: ErrorCategory): MappedStatus {
  switch (category) {
    case 'scrape':
    case 'busy':
    case 'session_not_found':
    case 'cancelled':
      return STATUS_BY_CATEGORY[category];
    default:
      return 502;
  }
}

/** Pipeline failure body; never includes the underlying cause. */
export function pipelineErrorResponse(c: Context, sessionId: string | null, error: PublicError) {
  return c.json(
    {
      status: 'error' as const,
      session_id: sessionId,
      data: [],
      message: error.message,
      error,
    },
    statusForCategory(error.category),
  );
}
