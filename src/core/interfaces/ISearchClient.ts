import { HealthStatus, QueryOutcome, QueryRequest } from '../entities/Query.js';

/**
 * Interface for the remote search API client
 */
export interface ISearchClient {
  /**
   * Send a fully specified query; failures come back as a QueryFailure
   */
  query(request: QueryRequest): Promise<QueryOutcome>;

  /**
   * Query with the configured defaults and no system message
   */
  simpleQuery(text: string): Promise<QueryOutcome>;

  /**
   * Check reachability and credential validity. Never rejects.
   */
  healthCheck(): Promise<HealthStatus>;
}
