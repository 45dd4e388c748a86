import { ScrapeError, errorMessage } from '../lib/errors.js';
import { decodeHtmlEntities, extractVisibleTextFromHtml, fetchPublicPage } from './http-fetch.js';
import type { FetchedPage, HostResolver } from './http-fetch.js';
import { NO_DESCRIPTION_FOUND } from './types.js';
import type { ScrapeResult, ScraperTool, ToolCallOptions } from './types.js';

const HOTEL_IMAGE_MARKER = 'cf.bstatic.com/xdata/images/hotel';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export interface BookingScraperOptions {
  fetchImpl?: typeof fetch;
  resolveHost?: HostResolver;
  userAgent?: string;
}

function readAttribute(tag: string, name: string): string | null {
  const match = new RegExp(`\\s${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'i').exec(tag);
  if (!match) return null;
  return decodeHtmlEntities(match[1] ?? match[2] ?? '');
}

/**
 * Inner HTML of the first element whose opening tag matches `openTag`,
 * counting nested elements of the same name to find its closing tag.
 */
export function extractElementHtml(html: string, openTag: RegExp): string | null {
  const open = openTag.exec(html);
  if (!open) return null;
  const tagName = /^<([a-z0-9]+)/i.exec(open[0])?.[1];
  if (!tagName) return null;

  const start = open.index + open[0].length;
  const tokens = new RegExp(`<(/?)${tagName}\\b[^>]*>`, 'gi');
  tokens.lastIndex = start;
  let depth = 1;
  let token: RegExpExecArray | null;
  while ((token = tokens.exec(html)) !== null) {
    depth += token[1] ? -1 : 1;
    if (depth === 0) return html.slice(start, token.index);
  }
  return html.slice(start);
}

function extractDescription(html: string): string {
  const block =
    extractElementHtml(html, /<[a-z0-9]+\b[^>]*data-testid\s*=\s*["']property-description["'][^>]*>/i)
    ?? extractElementHtml(html, /<[a-z0-9]+\b[^>]*id\s*=\s*["']property_description_content["'][^>]*>/i);
  if (block === null) return NO_DESCRIPTION_FOUND;
  const text = extractVisibleTextFromHtml(block);
  return text || NO_DESCRIPTION_FOUND;
}

function extractHotelName(html: string): string | undefined {
  const heading = extractElementHtml(html, /<h2\b[^>]*class\s*=\s*["'][^"']*\bpp-header__title\b[^"']*["'][^>]*>/i);
  const name = heading !== null ? extractVisibleTextFromHtml(heading) : '';
  if (name) return name;

  for (const tag of html.match(/<meta\b[^>]*>/gi) ?? []) {
    if (readAttribute(tag, 'property') === 'og:title') {
      const content = readAttribute(tag, 'content')?.trim();
      if (content) return content;
    }
  }
  return undefined;
}

function extractCanonicalUrl(html: string, fallback: string): string {
  for (const tag of html.match(/<link\b[^>]*>/gi) ?? []) {
    const rel = readAttribute(tag, 'rel')?.toLowerCase().split(/\s+/) ?? [];
    if (!rel.includes('canonical')) continue;
    const href = readAttribute(tag, 'href');
    if (!href) continue;
    try {
      return new URL(href, fallback).toString();
    } catch {
      continue;
    }
  }
  return fallback;
}

/** Hotel photo URLs from `<img>` tags, in page order, without duplicates. */
export function extractHotelImageUrls(html: string): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];
  for (const tag of html.match(/<img\b[^>]*>/gi) ?? []) {
    for (const attr of ['src', 'data-src']) {
      const value = readAttribute(tag, attr)?.trim();
      if (!value || !value.includes(HOTEL_IMAGE_MARKER)) continue;
      const url = value.startsWith('//') ? `https:${value}` : value;
      if (!seen.has(url)) {
        seen.add(url);
        urls.push(url);
      }
      break;
    }
  }
  return urls;
}

export function parseListingHtml(html: string, pageUrl: string): ScrapeResult {
  const hotelName = extractHotelName(html);
  return {
    description: extractDescription(html),
    canonical_url: extractCanonicalUrl(html, pageUrl),
    image_urls: extractHotelImageUrls(html),
    ...(hotelName ? { hotel_name: hotelName } : {}),
  };
}

/**
 * Scrapes a Booking.com property page over plain HTTP. Pages that render
 * their content client-side come back with the placeholder description.
 */
export class BookingListingScraper implements ScraperTool {
  constructor(private readonly options: BookingScraperOptions = {}) {}

  async scrape(listingUrl: string, options?: ToolCallOptions): Promise<ScrapeResult> {
    let page: FetchedPage;
    try {
      page = await fetchPublicPage(listingUrl, {
        signal: options?.signal,
        fetchImpl: this.options.fetchImpl,
        resolveHost: this.options.resolveHost,
        headers: {
          'User-Agent': this.options.userAgent ?? DEFAULT_USER_AGENT,
          'Accept-Language': 'en-US,en;q=0.9',
        },
      });
    } catch (err) {
      throw new ScrapeError(`Could not fetch listing page: ${errorMessage(err)}`, { cause: err });
    }
    return parseListingHtml(page.body, page.url);
  }
}
