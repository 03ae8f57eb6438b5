// Web Search Tool
// Wraps the Brave web search service as a tool

import { z } from 'zod';
import { env } from '../../env.js';
import { searchWeb } from '../web-search.js';
import type { ToolDefinition } from './types.js';

const WebSearchArgsSchema = z.object({
  query: z.string().trim().min(1, 'Query is required'),
  max_results: z.coerce.number().int().min(1).max(10).optional(),
});

export const webSearchTool: ToolDefinition = {
  name: 'search_web',
  description: 'Search the web for current information and recent events. Use this when you need up-to-date information not in your training data.',
  parameters: [
    {
      name: 'query',
      type: 'string',
      description: 'The search query to look up on the web',
      required: true,
    },
    {
      name: 'max_results',
      type: 'integer',
      description: 'Number of results to return (1-10)',
      required: false,
      default: 5,
    },
  ],
  execute: async (args) => {
    const parsed = WebSearchArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(parsed.error.issues.map(i => `${i.path.join('.') || 'args'}: ${i.message}`).join('; '));
    }

    const result = await searchWeb(parsed.data.query, parsed.data.max_results ?? env.WEB_SEARCH_MAX_RESULTS);
    if (!result) {
      throw new Error('Web search is not enabled or API key is missing');
    }

    return {
      query: result.query,
      results: result.hits.map((hit, idx) => ({
        rank: idx + 1,
        title: hit.title,
        url: hit.url,
        snippet: hit.snippet,
      })),
    };
  },
};
