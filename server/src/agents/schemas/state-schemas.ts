/**
 * Zod schemas for the shared state as it is read back from the session store.
 *
 * Stored JSON is untrusted (it may predate a code change or come from the
 * durable store written by another process), so every stage sees state that
 * has passed through these schemas. Unknown keys are dropped.
 */

import { z } from 'zod';
import type {
  AnalyzedImage,
  BookingData,
  GenerateInput,
  PipelineState,
  Post,
  WebsiteData,
} from '../types.js';

export const GenerateInputSchema: z.ZodType<GenerateInput> = z.object({
  listing_url: z.string().min(1),
  site_url: z.string().min(1).nullable(),
});

export const BookingDataSchema: z.ZodType<BookingData> = z.object({
  description: z.string().min(1),
  canonical_url: z.string(),
  image_urls: z.array(z.string().min(1)).min(1),
  hotel_name: z.string().optional(),
});

export const WebsiteDataSchema: z.ZodType<WebsiteData> = z.object({
  site_url: z.string().nullable(),
  queries: z.array(z.string()),
  snippets: z.array(z.object({ snippet: z.string(), source_url: z.string() })),
});

export const AnalyzedImageSchema: z.ZodType<AnalyzedImage> = z.object({
  image_url: z.string().min(1),
  tags: z.array(z.string()),
});

export const PostSchema: z.ZodType<Post> = z.object({
  image_url: z.string().min(1),
  caption: z.string(),
  hashtags: z.array(z.string()),
});

export const PipelineStateSchema: z.ZodType<PipelineState> = z.object({
  input: GenerateInputSchema.optional(),
  booking_data: BookingDataSchema.optional(),
  website_data: WebsiteDataSchema.optional(),
  analyzed_images: z.array(AnalyzedImageSchema).optional(),
  final_posts: z.array(PostSchema).optional(),
});
