import type { LLMProvider } from '../lib/llm-provider.js';

/**
 * Contracts for the external capabilities the stages call. Implementations
 * live beside this file; tests inject in-process fakes.
 */

export interface ToolCallOptions {
  signal?: AbortSignal;
}

/** Description a scraper reports when the page has no description block. */
export const NO_DESCRIPTION_FOUND = 'No description found.';

export interface ScrapeResult {
  description: string;
  canonical_url: string;
  image_urls: string[];
  hotel_name?: string;
}

/** Throws ScrapeError on network or parse failure. */
export interface ScraperTool {
  scrape(listingUrl: string, options?: ToolCallOptions): Promise<ScrapeResult>;
}

export interface SearchResult {
  snippet: string;
  source_url: string;
}

/** Resolves to an empty list when nothing matches. */
export interface SearchTool {
  search(query: string, options?: ToolCallOptions): Promise<SearchResult[]>;
}

export interface VisionResult {
  labels: string[];
  objects: string[];
  text: string[];
}

/** Throws VisionError for the one image that failed. */
export interface VisionTool {
  analyze(imageUrl: string, options?: ToolCallOptions): Promise<VisionResult>;
}

export interface PipelineTools {
  scraper: ScraperTool;
  search: SearchTool;
  vision: VisionTool;
  llm: LLMProvider;
}
