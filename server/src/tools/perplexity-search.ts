import { z } from 'zod';
import type { SearchResult, SearchTool, ToolCallOptions } from './types.js';

const PERPLEXITY_URL = 'https://api.perplexity.ai/chat/completions';
const DEFAULT_MODEL = 'sonar';

const SEARCH_SYSTEM_PROMPT =
  'You summarize what a hotel website says about itself. Answer in short factual sentences, '
  + 'only from the pages found, and say nothing if nothing relevant was found.';

const perplexityResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
  })).optional(),
  citations: z.array(z.string()).optional(),
  search_results: z.array(z.object({
    url: z.string(),
    title: z.string().nullable().optional(),
    snippet: z.string().nullable().optional(),
  })).optional(),
});

export interface PerplexitySearchOptions {
  apiKey: string;
  model?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Web search through Perplexity's sonar models. Per-result snippets are used
 * when the API returns them; otherwise the answer text becomes one snippet
 * attributed to the first citation.
 */
export class PerplexitySearchTool implements SearchTool {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: PerplexitySearchOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, options?: ToolCallOptions): Promise<SearchResult[]> {
    const response = await this.fetchImpl(PERPLEXITY_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.options.model ?? DEFAULT_MODEL,
        messages: [
          { role: 'system', content: SEARCH_SYSTEM_PROMPT },
          { role: 'user', content: query },
        ],
        temperature: 0.2,
        max_tokens: 1024,
      }),
      signal: options?.signal,
    });

    if (!response.ok) {
      const error = await response.text().catch(() => '');
      throw Object.assign(
        new Error(`Perplexity API error (${response.status}): ${error.slice(0, 300)}`),
        { status: response.status },
      );
    }

    const data = perplexityResponseSchema.parse(await response.json());

    const fromResults = (data.search_results ?? [])
      .map((r) => ({ snippet: (r.snippet ?? r.title ?? '').trim(), source_url: r.url }))
      .filter((r) => r.snippet.length > 0);
    if (fromResults.length > 0) return fromResults;

    const content = data.choices?.[0]?.message?.content?.trim() ?? '';
    if (!content) return [];
    return [{ snippet: content, source_url: data.citations?.[0] ?? '' }];
  }
}

/** Search tool used when no Perplexity key is configured. */
export class NoopSearchTool implements SearchTool {
  async search(): Promise<SearchResult[]> {
    return [];
  }
}
