import { Hono } from 'hono';
import { z } from 'zod';
import type { PipelineOrchestrator } from '../agents/pipeline.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';
import { pipelineErrorResponse } from './respond.js';

const MAX_GENERATE_BODY_BYTES = 10_000;

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'Must be an http(s) URL');

/**
 * Accepts both the legacy field names (`booking_url`, `website_url`) and
 * the pipeline's own (`listing_url`, `site_url`).
 */
export const generateRequestSchema = z
  .object({
    booking_url: httpUrl.optional(),
    listing_url: httpUrl.optional(),
    website_url: z.string().trim().max(2_000).nullish(),
    site_url: z.string().trim().max(2_000).nullish(),
  })
  .transform((body, ctx) => {
    const listingUrl = body.booking_url ?? body.listing_url;
    if (!listingUrl) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['booking_url'], message: 'booking_url is required' });
      return z.NEVER;
    }
    return { listing_url: listingUrl, site_url: body.website_url || body.site_url || null };
  });

export interface GenerateRouteDeps {
  orchestrator: PipelineOrchestrator;
  rateLimit: { max: number; windowMs: number };
}

export function createGenerateRoutes(deps: GenerateRouteDeps) {
  const generate = new Hono();

  // POST /api/generate
  // Body: { booking_url, website_url? }
  generate.post('/', rateLimitMiddleware(deps.rateLimit.max, deps.rateLimit.windowMs), async (c) => {
    const body = await parseJsonBodyWithLimit(c, MAX_GENERATE_BODY_BYTES);
    if (!body.ok) return body.response;

    const parsed = generateRequestSchema.safeParse(body.data);
    if (!parsed.success) {
      return c.json({ status: 'error', message: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const log = c.get('log');
    const { listing_url, site_url } = parsed.data;
    log.info({ listing_url, has_site_url: site_url !== null }, 'Generate request received');

    const result = await deps.orchestrator.generate(listing_url, site_url, { signal: c.req.raw.signal });
    if (result.status === 'error') {
      log.warn({ session_id: result.session_id, ...result.error }, 'Generate request failed');
      return pipelineErrorResponse(c, result.session_id, result.error);
    }

    return c.json({ status: 'success', session_id: result.session_id, data: result.posts });
  });

  return generate;
}
