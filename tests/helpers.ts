import { Config } from '../src/config.js';
import { HealthStatus, QueryOutcome, QueryRequest } from '../src/core/entities/Query.js';
import { ISearchClient } from '../src/core/interfaces/ISearchClient.js';

export function makeConfig(overrides: Partial<Config> = {}): Config {
  return {
    apiKey: 'test-api-key',
    credentialSource: 'env',
    baseUrl: 'https://api.perplexity.ai',
    defaultModel: 'sonar',
    maxTokens: 1000,
    temperature: 0.7,
    timeoutMs: 30000,
    healthCheckOnStart: false,
    server: { name: 'perplexity-mcp', version: '1.0.0', debug: false },
    ...overrides,
  };
}

/**
 * Answers every query with a fixed text and one citation
 */
export class StubSearchClient implements ISearchClient {
  calls = 0;

  async query(request: QueryRequest): Promise<QueryOutcome> {
    this.calls++;
    return {
      ok: true,
      result: {
        text: `Answer to: ${request.message}`,
        model: request.model,
        citations: ['https://example.com/source'],
      },
    };
  }

  async simpleQuery(text: string): Promise<QueryOutcome> {
    return this.query({ message: text, model: 'sonar', maxTokens: 1000, temperature: 0.7 });
  }

  async healthCheck(): Promise<HealthStatus> {
    return { ok: true, model: 'sonar' };
  }
}
