/**
 * Stage 1: Listing Scrape.
 *
 * Pulls the description and photo URLs off the listing page. Without both
 * there is nothing to write posts about, so either one missing is fatal.
 */

import { AppError, ScrapeError, errorMessage } from '../lib/errors.js';
import { NO_DESCRIPTION_FOUND } from '../tools/types.js';
import type { ScrapeResult } from '../tools/types.js';
import type { PipelineStage, StageContext } from './stage.js';
import type { BookingData, PipelineState } from './types.js';

export function dedupeImageUrls(urls: readonly string[], max: number): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of urls) {
    const url = raw.trim();
    if (!url || seen.has(url)) continue;
    seen.add(url);
    out.push(url);
    if (out.length >= max) break;
  }
  return out;
}

export class ListingScrapeStage implements PipelineStage<'booking_data'> {
  readonly name = 'listing_scrape' as const;
  readonly inputKeys = ['input'] as const;
  readonly outputKey = 'booking_data' as const;

  async execute(_state: PipelineState, ctx: StageContext) {
    const listingUrl = ctx.input.listing_url;

    let scraped: ScrapeResult;
    try {
      scraped = await ctx.callTool('scraper', (signal) => ctx.tools.scraper.scrape(listingUrl, { signal }));
    } catch (err) {
      if (err instanceof ScrapeError || (err instanceof AppError && err.category === 'cancelled')) throw err;
      throw new ScrapeError(`Scraper failed for ${listingUrl}: ${errorMessage(err)}`, { cause: err });
    }

    const description = scraped.description.trim();
    if (!description || description === NO_DESCRIPTION_FOUND) {
      throw new ScrapeError(`No description found on ${listingUrl}`);
    }

    const imageUrls = dedupeImageUrls(scraped.image_urls, ctx.settings.maxImages);
    if (imageUrls.length === 0) {
      throw new ScrapeError(`No images found on ${listingUrl}`);
    }

    const bookingData: BookingData = {
      description,
      canonical_url: scraped.canonical_url || listingUrl,
      image_urls: imageUrls,
      ...(scraped.hotel_name ? { hotel_name: scraped.hotel_name } : {}),
    };

    ctx.log.info(
      { image_count: imageUrls.length, scraped_image_count: scraped.image_urls.length },
      'Listing scraped',
    );
    return { key: this.outputKey, value: bookingData };
  }
}
