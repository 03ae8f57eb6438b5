// Web search via the Brave Search API
// Backs the search_web tool; disabled unless WEB_SEARCH_ENABLED and a key are set.

import { z } from 'zod';
import { env } from '../env.js';

const BRAVE_ENDPOINT = 'https://api.search.brave.com/res/v1/web/search';
const MAX_RESULTS = 10;

export interface WebSearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchResult {
  query: string;
  hits: WebSearchHit[];
}

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class BraveSearchClient {
  constructor(
    private readonly apiKey: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async search(query: string, count = 5, signal?: AbortSignal): Promise<WebSearchResult> {
    const q = query.trim();
    if (!q) {
      return { query: q, hits: [] };
    }

    const limit = Math.max(1, Math.min(count, MAX_RESULTS));
    const endpoint = new URL(BRAVE_ENDPOINT);
    endpoint.searchParams.set('q', q);
    endpoint.searchParams.set('count', String(limit));

    const response = await this.fetchImpl(endpoint.toString(), {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        'X-Subscription-Token': this.apiKey,
      },
      signal,
    });

    if (!response.ok) {
      throw new Error(`Brave Search error (${response.status})`);
    }

    const parsed = BraveResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Brave Search returned an unexpected payload');
    }

    const hits = (parsed.data.web?.results ?? [])
      .map(item => ({
        title: (item.title ?? '').trim(),
        url: (item.url ?? '').trim(),
        snippet: (item.description ?? '').trim(),
      }))
      .filter(hit => hit.title && hit.url)
      .slice(0, limit);

    return { query: q, hits };
  }
}

export function isWebSearchAvailable(): boolean {
  return env.WEB_SEARCH_ENABLED && !!env.BRAVE_SEARCH_API_KEY;
}

/** Null when web search is switched off or has no key. */
export async function searchWeb(query: string, count = 5, signal?: AbortSignal): Promise<WebSearchResult | null> {
  if (!isWebSearchAvailable()) return null;
  return new BraveSearchClient(env.BRAVE_SEARCH_API_KEY).search(query, count, signal);
}
