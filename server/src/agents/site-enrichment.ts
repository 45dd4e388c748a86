/**
 * Stage 2: Site Enrichment.
 *
 * Best-effort: searches the hotel's own website for amenities and "about"
 * copy. Every failure here is recorded and swallowed into empty data.
 */

import { AppError, EnrichmentError, errorMessage } from '../lib/errors.js';
import type { SearchResult } from '../tools/types.js';
import type { PipelineStage, StageContext } from './stage.js';
import type { PipelineState, WebsiteData, WebsiteSnippet } from './types.js';

export const MAX_WEBSITE_SNIPPETS = 10;

const QUERY_TOPICS = ['amenities', 'about us'];

/** Hostname of `siteUrl`, tolerating a missing scheme. Null when unparseable. */
export function siteHost(siteUrl: string): string | null {
  const trimmed = siteUrl.trim();
  if (!trimmed) return null;
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    const url = new URL(candidate);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    return url.hostname.replace(/^www\./i, '') || null;
  } catch {
    return null;
  }
}

export function buildSiteQueries(host: string): string[] {
  return QUERY_TOPICS.map((topic) => `site:${host} ${topic}`);
}

function mergeSnippets(batches: SearchResult[][]): WebsiteSnippet[] {
  const seen = new Set<string>();
  const out: WebsiteSnippet[] = [];
  for (const batch of batches) {
    for (const result of batch) {
      const snippet = result.snippet.trim();
      const key = snippet.toLowerCase();
      if (!snippet || seen.has(key)) continue;
      seen.add(key);
      out.push({ snippet, source_url: result.source_url });
      if (out.length >= MAX_WEBSITE_SNIPPETS) return out;
    }
  }
  return out;
}

export class SiteEnrichmentStage implements PipelineStage<'website_data'> {
  readonly name = 'site_enrichment' as const;
  readonly inputKeys = ['input', 'booking_data'] as const;
  readonly outputKey = 'website_data' as const;

  async execute(_state: PipelineState, ctx: StageContext) {
    const siteUrl = ctx.input.site_url;
    if (!siteUrl) {
      ctx.log.info('No site URL given, skipping enrichment');
      return { key: this.outputKey, value: emptyWebsiteData(null) };
    }

    const host = siteHost(siteUrl);
    if (!host) {
      await ctx.recordDegradation(new EnrichmentError(`Site URL is not a valid http(s) URL: ${siteUrl}`));
      return { key: this.outputKey, value: emptyWebsiteData(siteUrl) };
    }

    const queries = buildSiteQueries(host);
    const batches: SearchResult[][] = [];
    for (const query of queries) {
      try {
        batches.push(await ctx.callTool('search', (signal) => ctx.tools.search.search(query, { signal })));
      } catch (err) {
        if (err instanceof AppError && err.category === 'cancelled') throw err;
        ctx.log.warn({ query, error: errorMessage(err) }, 'Site search failed, continuing without it');
        await ctx.recordDegradation(
          new EnrichmentError(`Search failed for "${query}": ${errorMessage(err)}`, { cause: err }),
          { query },
        );
      }
    }

    const value: WebsiteData = { site_url: siteUrl, queries, snippets: mergeSnippets(batches) };
    ctx.log.info({ snippet_count: value.snippets.length }, 'Site enrichment complete');
    return { key: this.outputKey, value };
  }
}

function emptyWebsiteData(siteUrl: string | null): WebsiteData {
  return { site_url: siteUrl, queries: [], snippets: [] };
}
