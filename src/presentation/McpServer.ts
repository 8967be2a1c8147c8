import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { Config } from '../config.js';
import { NotFoundError, ValidationError } from '../core/errors.js';
import { ISearchClient } from '../core/interfaces/ISearchClient.js';
import { InvocationQueue } from '../infrastructure/queue/InvocationQueue.js';
import { DebugLog, Router } from './Router.js';

export type SessionState = 'initialized' | 'serving' | 'closed';

/**
 * Caller mistakes on prompts and resources surface as protocol errors
 */
function toProtocolError(error: unknown): unknown {
  if (error instanceof ValidationError || error instanceof NotFoundError) {
    return new McpError(ErrorCode.InvalidParams, error.message, error.details);
  }
  return error;
}

/**
 * MCP server session: publishes capabilities and serves requests one at a time
 */
export class McpServer {
  private server: Server;
  private router: Router;
  private queue = new InvocationQueue();
  private state: SessionState = 'initialized';
  private closedPromise: Promise<void>;
  private resolveClosed: () => void = () => {};
  private debugLog: DebugLog;

  constructor(
    private config: Config,
    client: ISearchClient
  ) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    this.closedPromise = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });

    this.router = new Router(config, client, this.debugLog);
    this.server = new Server(
      {
        name: config.server.name,
        version: config.server.version,
      },
      {
        capabilities: {
          tools: {},
          prompts: {},
          resources: {},
        },
      }
    );

    this.server.onclose = () => {
      this.state = 'closed';
      this.debugLog('session closed');
      this.resolveClosed();
    };
    this.server.onerror = (error) => {
      console.error('⚠️ Protocol error:', error.message);
    };

    this.registerHandlers();
  }

  private registerHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () =>
      this.queue.run(async () => ({ tools: this.router.listTools() }))
    );

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.queue.run(() =>
        this.router.callTool(request.params.name, request.params.arguments)
      )
    );

    this.server.setRequestHandler(ListPromptsRequestSchema, async () =>
      this.queue.run(async () => ({ prompts: this.router.listPrompts() }))
    );

    this.server.setRequestHandler(GetPromptRequestSchema, async (request) =>
      this.queue.run(async () => {
        try {
          return this.router.getPrompt(request.params.name, request.params.arguments ?? {});
        } catch (error) {
          throw toProtocolError(error);
        }
      })
    );

    this.server.setRequestHandler(ListResourcesRequestSchema, async () =>
      this.queue.run(async () => ({ resources: this.router.listResources() }))
    );

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) =>
      this.queue.run(async () => {
        const { uri } = request.params;
        try {
          const text = this.router.readResource(uri);
          return { contents: [{ uri, mimeType: 'text/plain', text }] };
        } catch (error) {
          throw toProtocolError(error);
        }
      })
    );
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Resolves once the transport has closed
   */
  closed(): Promise<void> {
    return this.closedPromise;
  }

  /**
   * Serve on an arbitrary transport
   */
  async connect(transport: Transport) {
    if (this.state !== 'initialized') {
      throw new Error(`Cannot connect: session is ${this.state}`);
    }
    await this.server.connect(transport);
    this.state = 'serving';
    this.debugLog('transport connected');
  }

  /**
   * Serve on stdin/stdout
   */
  async start() {
    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      console.error('⚠️ stdin error (non-fatal):', error.message);
    });

    process.stdout.on('error', (error) => {
      console.error('⚠️ stdout error (non-fatal):', error.message);
    });

    // The stdio transport does not report end of input itself
    process.stdin.on('end', () => {
      console.error('⚠️ stdin ended - client disconnected');
      this.shutdown().catch((error: unknown) => {
        console.error('⚠️ Error while closing session:', error);
      });
    });

    await this.connect(transport);
    console.error(`\n✅ ${this.config.server.name} MCP Server running on stdio`);
  }

  /**
   * Graceful shutdown
   */
  async shutdown() {
    if (this.state === 'closed') {
      return;
    }
    console.error('\n👋 Shutting down gracefully...');
    if (this.state === 'initialized') {
      // Never connected, so no transport will report the close
      this.state = 'closed';
      this.resolveClosed();
      return;
    }
    await this.server.close();
  }
}
