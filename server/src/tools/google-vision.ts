import { z } from 'zod';
import { VisionError, errorMessage } from '../lib/errors.js';
import type { ToolCallOptions, VisionResult, VisionTool } from './types.js';

const VISION_URL = 'https://vision.googleapis.com/v1/images:annotate';

export const LABEL_MIN_SCORE = 0.75;
export const OBJECT_MIN_SCORE = 0.6;

const annotationSchema = z.object({
  labelAnnotations: z.array(z.object({
    description: z.string(),
    score: z.number().optional(),
  })).optional(),
  localizedObjectAnnotations: z.array(z.object({
    name: z.string(),
    score: z.number().optional(),
  })).optional(),
  textAnnotations: z.array(z.object({
    description: z.string(),
  })).optional(),
  error: z.object({ code: z.number().optional(), message: z.string() }).optional(),
});

const visionResponseSchema = z.object({
  responses: z.array(annotationSchema).optional(),
});

export type VisionAnnotation = z.infer<typeof annotationSchema>;

/**
 * Keep confident labels and objects, and the individual words found in the
 * image. The first text annotation is the whole detected block, so it is skipped.
 */
export function toVisionResult(annotation: VisionAnnotation): VisionResult {
  return {
    labels: (annotation.labelAnnotations ?? [])
      .filter((l) => (l.score ?? 0) > LABEL_MIN_SCORE)
      .map((l) => l.description),
    objects: (annotation.localizedObjectAnnotations ?? [])
      .filter((o) => (o.score ?? 0) > OBJECT_MIN_SCORE)
      .map((o) => o.name),
    text: (annotation.textAnnotations ?? []).slice(1).map((t) => t.description),
  };
}

export interface GoogleVisionOptions {
  apiKey: string;
  fetchImpl?: typeof fetch;
}

/** Google Cloud Vision over its REST endpoint, one image per request. */
export class GoogleVisionTool implements VisionTool {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GoogleVisionOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async analyze(imageUrl: string, options?: ToolCallOptions): Promise<VisionResult> {
    let body: unknown;
    try {
      const response = await this.fetchImpl(`${VISION_URL}?key=${encodeURIComponent(this.options.apiKey)}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          requests: [{
            image: { source: { imageUri: imageUrl } },
            features: [
              { type: 'LABEL_DETECTION', maxResults: 15 },
              { type: 'OBJECT_LOCALIZATION', maxResults: 10 },
              { type: 'TEXT_DETECTION', maxResults: 10 },
            ],
          }],
        }),
        signal: options?.signal,
      });
      if (!response.ok) {
        throw Object.assign(new Error(`Vision API error (${response.status})`), { status: response.status });
      }
      body = await response.json();
    } catch (err) {
      throw new VisionError(`Vision request failed: ${errorMessage(err)}`, imageUrl, { cause: err });
    }

    const parsed = visionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new VisionError('Vision API returned an unexpected payload', imageUrl, { cause: parsed.error });
    }
    const annotation = parsed.data.responses?.[0];
    if (!annotation) {
      throw new VisionError('Vision API returned no annotation', imageUrl);
    }
    if (annotation.error) {
      throw new VisionError(`Vision API could not annotate image: ${annotation.error.message}`, imageUrl);
    }
    return toVisionResult(annotation);
  }
}
