/**
 * Stage 4: Copywriting.
 *
 * One batched model call that drafts a caption and hashtags for every
 * analyzed image. The stage returns the model's raw text untouched; turning
 * it into posts is the normalizer's job.
 */

import { AppError, GenerationError, errorMessage } from '../lib/errors.js';
import { DEFAULT_MAX_TOKENS } from '../lib/config.js';
import { getCopywriterModel } from '../lib/llm.js';
import type { PipelineStage, StageContext } from './stage.js';
import type { AnalyzedImage, CopywritingOutput, PipelineState, WebsiteData } from './types.js';

const MAX_DESCRIPTION_CHARS = 6_000;
const MAX_SNIPPET_CHARS = 400;

export const COPYWRITER_SYSTEM_PROMPT = `You are a social media copywriter for hotels.
For every image you are given, write one Instagram-style post that sells the stay.

Rules:
- The caption is 2-3 sentences, grounded in that image's tags and the hotel description.
- Give 3-5 hashtags per post, each starting with "#", no spaces inside a hashtag.
- Do not invent amenities that are not in the description, the website notes or the tags.
- Write exactly one post per image and copy each image_url exactly as given.

Return ONLY a JSON array, no commentary:
[{"image_url": "...", "caption": "...", "hashtags": ["#...", "#..."]}]`;

export interface CopywritingOptions {
  /** Overrides the provider's default copywriting model. */
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export function buildCopywritingPrompt(
  description: string,
  images: readonly AnalyzedImage[],
  website?: WebsiteData,
  hotelName?: string,
): string {
  const lines: string[] = [];
  if (hotelName) lines.push(`HOTEL: ${hotelName}`, '');

  lines.push('DESCRIPTION:', description.slice(0, MAX_DESCRIPTION_CHARS), '');

  if (website && website.snippets.length > 0) {
    lines.push('FROM THE HOTEL WEBSITE:');
    for (const s of website.snippets) {
      lines.push(`- ${s.snippet.slice(0, MAX_SNIPPET_CHARS)}`);
    }
    lines.push('');
  }

  lines.push(`IMAGES (${images.length}):`);
  images.forEach((image, i) => {
    const tags = image.tags.length > 0 ? image.tags.join(', ') : '(no tags available)';
    lines.push(`${i + 1}. image_url: ${image.image_url}`, `   tags: ${tags}`);
  });

  return lines.join('\n');
}

export class CopywritingStage implements PipelineStage<'final_posts'> {
  readonly name = 'copywriting' as const;
  readonly inputKeys = ['booking_data', 'analyzed_images'] as const;
  readonly outputKey = 'final_posts' as const;

  constructor(private readonly options: CopywritingOptions = {}) {}

  async execute(state: PipelineState, ctx: StageContext) {
    const output = await this.draft(state, state.analyzed_images ?? [], ctx);
    return { key: this.outputKey, value: output };
  }

  /**
   * Draft posts for `images` only. Used for the full batch and for follow-up
   * calls that fill slots the first response left empty.
   */
  async draft(state: PipelineState, images: readonly AnalyzedImage[], ctx: StageContext): Promise<CopywritingOutput> {
    const description = state.booking_data?.description ?? '';
    const model = this.options.model ?? getCopywriterModel(ctx.tools.llm);
    const prompt = buildCopywritingPrompt(description, images, state.website_data, state.booking_data?.hotel_name);

    let text: string;
    try {
      const response = await ctx.callTool('llm', (signal) =>
        ctx.tools.llm.chat({
          model,
          system: COPYWRITER_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
          ...(this.options.temperature !== undefined && { temperature: this.options.temperature }),
          signal,
          session_id: ctx.session_id,
        }),
      );
      text = response.text;
    } catch (err) {
      if (err instanceof AppError && err.category === 'cancelled') throw err;
      throw new GenerationError(`Copywriting model call failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!text.trim()) {
      throw new GenerationError('Copywriting model returned an empty response');
    }
    ctx.log.info({ model, image_count: images.length, chars: text.length }, 'Copy drafted');
    return { raw: text, model };
  }
}
