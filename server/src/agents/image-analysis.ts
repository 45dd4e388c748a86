/**
 * Stage 3: Image Analysis.
 *
 * Tags every listing photo independently. Results are joined by position so
 * `analyzed_images[i]` always describes `booking_data.image_urls[i]`; a photo
 * the vision tool cannot handle keeps its slot with no tags.
 */

import { mapInOrder } from '../lib/concurrency.js';
import { AppError, VisionError, errorMessage } from '../lib/errors.js';
import type { VisionResult } from '../tools/types.js';
import type { PipelineStage, StageContext } from './stage.js';
import type { AnalyzedImage, PipelineState } from './types.js';

export const MAX_IMAGE_TAGS = 8;
export const MAX_TEXT_TAG_LENGTH = 30;

function cleanTag(raw: string): string {
  return raw.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Labels first, then detected objects, then short single-word text found in
 * the image. Duplicates are dropped case-insensitively.
 */
export function reduceToTags(result: VisionResult): string[] {
  const textTags = result.text
    .map((t) => t.trim())
    .filter((t) => t.length > 0 && t.length <= MAX_TEXT_TAG_LENGTH && !/\s/.test(t));

  const tags: string[] = [];
  const seen = new Set<string>();
  for (const raw of [...result.labels, ...result.objects, ...textTags]) {
    const tag = cleanTag(raw);
    if (!tag || seen.has(tag)) continue;
    seen.add(tag);
    tags.push(tag);
    if (tags.length >= MAX_IMAGE_TAGS) break;
  }
  return tags;
}

export class ImageAnalysisStage implements PipelineStage<'analyzed_images'> {
  readonly name = 'image_analysis' as const;
  readonly inputKeys = ['booking_data'] as const;
  readonly outputKey = 'analyzed_images' as const;

  async execute(state: PipelineState, ctx: StageContext) {
    const imageUrls = state.booking_data?.image_urls ?? [];
    let failures = 0;

    const analyzed = await mapInOrder(imageUrls, ctx.settings.imageConcurrency, async (imageUrl, index): Promise<AnalyzedImage> => {
      try {
        const result = await ctx.callTool('vision', (signal) => ctx.tools.vision.analyze(imageUrl, { signal }));
        return { image_url: imageUrl, tags: reduceToTags(result) };
      } catch (err) {
        if (err instanceof AppError && err.category === 'cancelled') throw err;
        failures += 1;
        const visionError = err instanceof VisionError
          ? err
          : new VisionError(`Vision analysis failed: ${errorMessage(err)}`, imageUrl, { cause: err });
        ctx.log.warn({ imageUrl, index, error: visionError.message }, 'Image analysis failed, using empty tags');
        await ctx.recordDegradation(visionError, { image_url: imageUrl, index });
        return { image_url: imageUrl, tags: [] };
      }
    });

    ctx.log.info({ image_count: analyzed.length, failures }, 'Image analysis complete');
    return { key: this.outputKey, value: analyzed };
  }
}
