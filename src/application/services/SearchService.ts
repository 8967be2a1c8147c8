import { ISearchClient } from '../../core/interfaces/ISearchClient.js';
import { QueryOutcome, QueryRequest, QueryResult } from '../../core/entities/Query.js';

export interface FormatOptions {
  /** Append the model used and token usage */
  includeFooter: boolean;
}

/**
 * Service for running queries against the remote search API
 */
export class SearchService {
  constructor(private client: ISearchClient) {}

  async search(request: QueryRequest): Promise<QueryOutcome> {
    return this.client.query(request);
  }

  /**
   * Format a result for display: answer, then sources, then the optional footer
   */
  formatResult(result: QueryResult, options: FormatOptions): string {
    let text = result.text;

    if (result.citations && result.citations.length > 0) {
      const sources = result.citations.map((citation, index) => `${index + 1}. ${citation}`);
      text += `\n\n**Sources:**\n${sources.join('\n')}`;
    }

    if (options.includeFooter) {
      const usage = result.usage
        ? ` | Tokens: ${result.usage.promptTokens} prompt + ${result.usage.completionTokens} completion = ${result.usage.totalTokens}`
        : '';
      text += `\n\n---\n*Model: ${result.model}${usage}*`;
    }

    return text;
  }
}
