/**
 * Shared type definitions for the post generation pipeline.
 *
 * Each stage reads the session's state and returns exactly one keyed update.
 * All data passed between stages goes through these interfaces.
 */

import type { PublicError } from '../lib/errors.js';

// ─── Run input ───────────────────────────────────────────────────────

export interface GenerateInput {
  listing_url: string;
  site_url: string | null;
}

// ─── Stage 1: Listing Scrape ─────────────────────────────────────────

export interface BookingData {
  description: string;
  canonical_url: string;
  /** Page order, de-duplicated, capped. */
  image_urls: string[];
  hotel_name?: string;
}

// ─── Stage 2: Site Enrichment ────────────────────────────────────────

export interface WebsiteSnippet {
  snippet: string;
  source_url: string;
}

export interface WebsiteData {
  site_url: string | null;
  queries: string[];
  snippets: WebsiteSnippet[];
}

// ─── Stage 3: Image Analysis ─────────────────────────────────────────

export interface AnalyzedImage {
  image_url: string;
  tags: string[];
}

// ─── Stage 4: Copywriting ────────────────────────────────────────────

/** Unparsed model output; the normalizer turns it into posts. */
export interface CopywritingOutput {
  raw: string;
  model: string;
}

export interface Post {
  readonly image_url: string;
  readonly caption: string;
  readonly hashtags: readonly string[];
}

// ─── Shared state ────────────────────────────────────────────────────

export interface PipelineState {
  input?: GenerateInput;
  booking_data?: BookingData;
  website_data?: WebsiteData;
  analyzed_images?: AnalyzedImage[];
  final_posts?: Post[];
}

export type StageOutputKey = 'booking_data' | 'website_data' | 'analyzed_images' | 'final_posts';

export type StageUpdate =
  | { key: 'booking_data'; value: BookingData }
  | { key: 'website_data'; value: WebsiteData }
  | { key: 'analyzed_images'; value: AnalyzedImage[] }
  | { key: 'final_posts'; value: CopywritingOutput };

// ─── Caller-facing result ────────────────────────────────────────────

export type GenerateResult =
  | { status: 'success'; session_id: string; posts: Post[] }
  | { status: 'error'; session_id: string | null; error: PublicError };
