import { ResourceDescriptor } from '../../core/entities/Descriptors.js';
import { SEARCH_MODELS } from '../../core/entities/Query.js';

export const SERVER_INFO_URI = 'perplexity://info';

export const serverInfoResource: ResourceDescriptor = {
  uri: SERVER_INFO_URI,
  name: 'Perplexity Server Info',
  description: 'Information about the Perplexity MCP server',
  mimeType: 'text/plain',
};

export function renderServerInfo(defaultModel: string): string {
  const models = SEARCH_MODELS.map(
    (model) => `- ${model}${model === defaultModel ? ' (default)' : ''}`
  ).join('\n');

  return `Perplexity MCP Server

This server provides access to Perplexity AI through the Model Context Protocol.

Available Tools:
- query_perplexity: Full-featured query with model selection and parameters
- search_perplexity: Quick search with default settings

Available Prompts:
- research_topic: Research a topic with detailed information and citations
- quick_fact_check: Quickly verify a fact or claim
- explain_concept: Explain a concept at a beginner, intermediate or advanced level

Available Models:
${models}

All models search the web in real time and may return source citations.
`;
}
