import { z } from 'zod';
import { Config } from '../../config.js';
import { SEARCH_MODELS, QueryRequest } from '../../core/entities/Query.js';
import { optionalChoice, optionalNumber, optionalText, requiredText } from '../schema/ToolArguments.js';

export const MAX_TOKENS_LIMIT = 4000;

export const queryPerplexitySchema = z.object({
  message: requiredText('The question or prompt to send to Perplexity AI'),
  model: optionalChoice(SEARCH_MODELS, 'Model to use (default: sonar)'),
  max_tokens: optionalNumber(
    { integer: true, minimum: 1, maximum: MAX_TOKENS_LIMIT },
    'Maximum tokens in response (default: 1000)'
  ),
  temperature: optionalNumber({ minimum: 0, maximum: 2 }, 'Response randomness 0-2 (default: 0.7)'),
  system_message: optionalText('Optional system message to set context'),
});

export type QueryPerplexityArgs = z.infer<typeof queryPerplexitySchema>;

/**
 * Full-parameter query tool
 */
export const queryPerplexityTool = {
  kind: 'query',
  name: 'query_perplexity',
  description:
    'Query Perplexity AI for information. This tool provides access to real-time web search ' +
    'and AI-powered answers with citations. Use this for research, fact-checking, and getting ' +
    'current information.',
  schema: queryPerplexitySchema,
} as const;

/**
 * Build a request from validated arguments, filling omitted fields from config
 */
export function buildQueryRequest(args: QueryPerplexityArgs, config: Config): QueryRequest {
  const request: QueryRequest = {
    message: args.message,
    model: args.model ?? config.defaultModel,
    maxTokens: args.max_tokens ?? config.maxTokens,
    temperature: args.temperature ?? config.temperature,
  };
  if (args.system_message) {
    request.systemMessage = args.system_message;
  }
  return request;
}
