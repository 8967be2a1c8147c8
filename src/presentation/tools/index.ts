import { queryPerplexityTool } from './QueryPerplexityTool.js';
import { searchPerplexityTool } from './SearchPerplexityTool.js';
import { SearchTool } from './types.js';

export { buildQueryRequest, queryPerplexitySchema, queryPerplexityTool } from './QueryPerplexityTool.js';
export type { QueryPerplexityArgs } from './QueryPerplexityTool.js';
export { buildSearchRequest, searchPerplexitySchema, searchPerplexityTool } from './SearchPerplexityTool.js';
export type { SearchPerplexityArgs } from './SearchPerplexityTool.js';
export type { SearchTool } from './types.js';

export const SEARCH_TOOLS: readonly SearchTool[] = [queryPerplexityTool, searchPerplexityTool];

export function findTool(name: string): SearchTool | undefined {
  return SEARCH_TOOLS.find((tool) => tool.name === name);
}
