import { z } from 'zod';
import { Config } from '../../config.js';
import { QueryRequest } from '../../core/entities/Query.js';
import { requiredText } from '../schema/ToolArguments.js';

export const searchPerplexitySchema = z.object({
  query: requiredText('The search query'),
});

export type SearchPerplexityArgs = z.infer<typeof searchPerplexitySchema>;

/**
 * Simplified search tool: the query alone, everything else from defaults
 */
export const searchPerplexityTool = {
  kind: 'search',
  name: 'search_perplexity',
  description:
    'Quick web search using Perplexity AI with default settings. ' +
    'Best for simple queries that need real-time information from the web.',
  schema: searchPerplexitySchema,
} as const;

export function buildSearchRequest(args: SearchPerplexityArgs, config: Config): QueryRequest {
  return {
    message: args.query,
    model: config.defaultModel,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
  };
}
