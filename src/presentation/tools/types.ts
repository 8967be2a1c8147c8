import { queryPerplexityTool } from './QueryPerplexityTool.js';
import { searchPerplexityTool } from './SearchPerplexityTool.js';

/**
 * The two search tools, tagged by kind
 */
export type SearchTool = typeof queryPerplexityTool | typeof searchPerplexityTool;
