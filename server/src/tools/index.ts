import { VisionError } from '../lib/errors.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import type { Logger } from '../lib/logger.js';
import { BookingListingScraper } from './booking-scraper.js';
import { GoogleVisionTool } from './google-vision.js';
import { NoopSearchTool, PerplexitySearchTool } from './perplexity-search.js';
import type { PipelineTools, VisionResult, VisionTool } from './types.js';

export type {
  PipelineTools,
  ScrapeResult,
  ScraperTool,
  SearchResult,
  SearchTool,
  ToolCallOptions,
  VisionResult,
  VisionTool,
} from './types.js';

/** Stand-in when no Vision key is set: every image degrades to empty tags. */
class UnconfiguredVisionTool implements VisionTool {
  async analyze(imageUrl: string): Promise<VisionResult> {
    throw new VisionError('GOOGLE_VISION_API_KEY is not set', imageUrl);
  }
}

/**
 * Build the production tool set from environment credentials. Missing search
 * or vision keys degrade those stages instead of stopping the server.
 */
export function createDefaultTools(llm: LLMProvider, log: Logger, env: NodeJS.ProcessEnv = process.env): PipelineTools {
  const perplexityKey = env.PERPLEXITY_API_KEY;
  if (!perplexityKey) {
    log.warn('PERPLEXITY_API_KEY not set, site enrichment will be empty');
  }
  const visionKey = env.GOOGLE_VISION_API_KEY;
  if (!visionKey) {
    log.warn('GOOGLE_VISION_API_KEY not set, images will not be tagged');
  }

  return {
    scraper: new BookingListingScraper(),
    search: perplexityKey
      ? new PerplexitySearchTool({ apiKey: perplexityKey, model: env.PERPLEXITY_MODEL })
      : new NoopSearchTool(),
    vision: visionKey ? new GoogleVisionTool({ apiKey: visionKey }) : new UnconfiguredVisionTool(),
    llm,
  };
}
