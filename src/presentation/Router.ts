import { Config } from '../config.js';
import {
  PromptDescriptor,
  ResourceDescriptor,
  ToolDescriptor,
} from '../core/entities/Descriptors.js';
import { QueryOutcome, QueryRequest } from '../core/entities/Query.js';
import { NotFoundError } from '../core/errors.js';
import { ISearchClient } from '../core/interfaces/ISearchClient.js';
import { RenderedPrompt, TemplateFactory } from '../core/templates/index.js';
import { SearchService } from '../application/services/SearchService.js';
import { describeFailure } from '../infrastructure/http/PerplexityApiClient.js';
import { SERVER_INFO_URI, renderServerInfo, serverInfoResource } from './resources/ServerInfoResource.js';
import { ArgumentIssue, ArgumentsOutcome, parseArguments, toInputSchema } from './schema/ToolArguments.js';
import {
  SEARCH_TOOLS,
  SearchTool,
  buildQueryRequest,
  buildSearchRequest,
  findTool,
} from './tools/index.js';

export type TextContent = { type: 'text'; text: string };

/**
 * Tool call response. isError marks an application-level failure;
 * the envelope itself is always a successful protocol response.
 */
export type ContentResult = {
  content: TextContent[];
  isError?: boolean;
};

export type DebugLog = (message: string) => void;

function textResult(text: string, isError = false): ContentResult {
  const result: ContentResult = { content: [{ type: 'text', text }] };
  if (isError) {
    result.isError = true;
  }
  return result;
}

function formatIssues(tool: string, issues: ArgumentIssue[]): string {
  const lines = issues.map((issue) => `- ${issue.field}: ${issue.reason}`);
  return `invalid arguments for ${tool}\n${lines.join('\n')}`;
}

/**
 * Capability discovery and dispatch for tools, prompts and resources
 */
export class Router {
  private searchService: SearchService;

  constructor(
    private config: Config,
    client: ISearchClient,
    private debugLog: DebugLog = () => {}
  ) {
    this.searchService = new SearchService(client);
  }

  listTools(): ToolDescriptor[] {
    return SEARCH_TOOLS.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.schema),
    }));
  }

  listPrompts(): PromptDescriptor[] {
    return TemplateFactory.describeAll();
  }

  /**
   * Render a prompt template.
   * Throws NotFoundError for unknown names, ValidationError for bad arguments.
   */
  getPrompt(name: string, args: Record<string, string> = {}): RenderedPrompt {
    return TemplateFactory.getTemplate(name).render(args);
  }

  listResources(): ResourceDescriptor[] {
    return [{ ...serverInfoResource }];
  }

  readResource(uri: string): string {
    if (uri !== SERVER_INFO_URI) {
      throw new NotFoundError(`Unknown resource: ${uri}`, { uri });
    }
    return renderServerInfo(this.config.defaultModel);
  }

  /**
   * Dispatch a tool call. Unknown tools, invalid arguments and remote
   * failures all come back as error content, never as exceptions.
   */
  async callTool(name: string, args: Record<string, unknown> | undefined): Promise<ContentResult> {
    const tool = findTool(name);
    if (!tool) {
      return textResult(`unknown tool: ${name}`, true);
    }

    const prepared = this.prepareRequest(tool, args);
    if (!prepared.ok) {
      this.debugLog(`[${tool.name}] rejected arguments: ${prepared.issues.map((i) => i.field).join(', ')}`);
      return textResult(formatIssues(tool.name, prepared.issues), true);
    }

    const request = prepared.data;
    this.debugLog(`[${tool.name}] executing with message: ${request.message.substring(0, 100)}`);

    let outcome: QueryOutcome;
    try {
      outcome = await this.searchService.search(request);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      outcome = { ok: false, error: { kind: 'upstream', detail } };
    }

    if (!outcome.ok) {
      const cause = describeFailure(outcome.error);
      console.error(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          tool: tool.name,
          kind: outcome.error.kind,
          message: cause,
        })
      );
      return textResult(cause, true);
    }

    return textResult(
      this.searchService.formatResult(outcome.result, { includeFooter: tool.kind === 'query' })
    );
  }

  private prepareRequest(
    tool: SearchTool,
    args: Record<string, unknown> | undefined
  ): ArgumentsOutcome<QueryRequest> {
    switch (tool.kind) {
      case 'query': {
        const parsed = parseArguments(tool.schema, args);
        return parsed.ok ? { ok: true, data: buildQueryRequest(parsed.data, this.config) } : parsed;
      }
      case 'search': {
        const parsed = parseArguments(tool.schema, args);
        return parsed.ok ? { ok: true, data: buildSearchRequest(parsed.data, this.config) } : parsed;
      }
    }
  }
}
