import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import { API_KEY_ENV, Config } from '../../config.js';
import { ISearchClient } from '../../core/interfaces/ISearchClient.js';
import {
  HealthStatus,
  QueryFailure,
  QueryOutcome,
  QueryRequest,
  QueryResult,
} from '../../core/entities/Query.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
  citations: z.array(z.string()).optional().catch(undefined),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional()
    .catch(undefined),
});

const ApiErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

const MAX_DETAIL_LENGTH = 200;

/**
 * Perplexity chat-completions client.
 * One POST per call: no retries, no caching.
 */
export class PerplexityApiClient implements ISearchClient {
  private endpoint: string;
  private headers: Record<string, string>;

  constructor(
    private config: Config,
    private fetchFn: FetchFn = fetch
  ) {
    this.endpoint = `${config.baseUrl}/chat/completions`;
    this.headers = {
      Authorization: `Bearer ${config.apiKey}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  async query(request: QueryRequest): Promise<QueryOutcome> {
    const messages: ChatMessage[] = [];
    if (request.systemMessage) {
      messages.push({ role: 'system', content: request.systemMessage });
    }
    messages.push({ role: 'user', content: request.message });

    let res: Response;
    let body: string;
    try {
      res = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({
          model: request.model,
          messages,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        }),
        timeout: this.config.timeoutMs,
      });
      body = await res.text();
    } catch (error) {
      return { ok: false, error: this.classifyNetworkError(error) };
    }

    if (!res.ok) {
      return { ok: false, error: this.classifyStatus(res.status, body) };
    }

    return this.parseCompletion(body, request.model);
  }

  async simpleQuery(text: string): Promise<QueryOutcome> {
    return this.query({
      message: text,
      model: this.config.defaultModel,
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature,
    });
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      const outcome = await this.simpleQuery('Hello');
      if (outcome.ok) {
        return { ok: true, model: outcome.result.model };
      }
      return { ok: false, error: describeFailure(outcome.error) };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  private classifyStatus(status: number, body: string): QueryFailure {
    if (status === 401 || status === 403) {
      return { kind: 'auth', status };
    }
    if (status === 429) {
      return { kind: 'rate_limit', status };
    }
    const message = extractApiMessage(body);
    return { kind: 'upstream', detail: message ? `HTTP ${status}: ${message}` : `HTTP ${status}` };
  }

  private classifyNetworkError(error: unknown): QueryFailure {
    if (error instanceof FetchError) {
      if (error.type === 'request-timeout' || error.type === 'body-timeout') {
        return { kind: 'timeout', timeoutMs: this.config.timeoutMs };
      }
      return { kind: 'upstream', detail: `network error: ${error.message}` };
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return { kind: 'timeout', timeoutMs: this.config.timeoutMs };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { kind: 'upstream', detail: `network error: ${message}` };
  }

  private parseCompletion(body: string, requestedModel: string): QueryOutcome {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      return { ok: false, error: { kind: 'upstream', detail: 'response body is not valid JSON' } };
    }

    const parsed = ChatCompletionSchema.safeParse(json);
    if (!parsed.success) {
      return {
        ok: false,
        error: { kind: 'upstream', detail: 'unexpected response format: missing choices[0].message.content' },
      };
    }

    const data = parsed.data;
    const result: QueryResult = {
      text: data.choices[0].message.content,
      model: data.model || requestedModel,
    };
    if (data.citations && data.citations.length > 0) {
      result.citations = data.citations;
    }
    if (data.usage) {
      result.usage = {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
        totalTokens: data.usage.total_tokens,
      };
    }
    return { ok: true, result };
  }
}

function extractApiMessage(body: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    const text = body.trim();
    return text ? text.slice(0, MAX_DETAIL_LENGTH) : undefined;
  }
  const parsed = ApiErrorSchema.safeParse(json);
  return parsed.success ? parsed.data.error.message.slice(0, MAX_DETAIL_LENGTH) : undefined;
}

/**
 * Human-readable cause for a remote-call failure
 */
export function describeFailure(failure: QueryFailure): string {
  switch (failure.kind) {
    case 'auth':
      return `authentication failed (HTTP ${failure.status}): check ${API_KEY_ENV}`;
    case 'rate_limit':
      return 'rate limited, try later';
    case 'timeout':
      return `request timed out after ${failure.timeoutMs / 1000}s`;
    case 'upstream':
      return `upstream error: ${failure.detail}`;
  }
}
