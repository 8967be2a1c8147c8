/**
 * Query-related domain entities
 */
export const SEARCH_MODELS = ['sonar', 'sonar-pro', 'sonar-reasoning'] as const;

export type SearchModel = (typeof SEARCH_MODELS)[number];

export function isSearchModel(value: string): value is SearchModel {
  return SEARCH_MODELS.some((model) => model === value);
}

export interface QueryRequest {
  message: string;
  model: SearchModel;
  maxTokens: number;
  temperature: number;
  systemMessage?: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface QueryResult {
  text: string;
  model: string;
  citations?: string[];
  usage?: TokenUsage;
}

/**
 * Ways a remote call can fail. Returned, never thrown.
 */
export type QueryFailure =
  | { kind: 'auth'; status: number }
  | { kind: 'rate_limit'; status: number }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'upstream'; detail: string };

export type QueryOutcome =
  | { ok: true; result: QueryResult }
  | { ok: false; error: QueryFailure };

export type HealthStatus =
  | { ok: true; model: string }
  | { ok: false; error: string };
