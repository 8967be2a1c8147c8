import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { Config, ResolveConfigOptions, printConfigInfo, resolveConfig } from './config.js';
import { ConfigError } from './core/errors.js';
import { ISearchClient } from './core/interfaces/ISearchClient.js';
import { PerplexityApiClient } from './infrastructure/http/PerplexityApiClient.js';
import { McpServer } from './presentation/McpServer.js';

/**
 * Requests a shutdown; the highest exit code requested wins
 */
export type StopFn = (reason: string, exitCode: number) => void;

export interface RunOptions extends ResolveConfigOptions {
  createClient?: (config: Config) => ISearchClient;
  /** Serve on this transport instead of stdio */
  transport?: Transport;
  installHandlers?: (stop: StopFn) => void;
}

export function installProcessHandlers(stop: StopFn): void {
  process.on('SIGINT', () => stop('SIGINT', 0));
  process.on('SIGTERM', () => stop('SIGTERM', 0));

  process.on('uncaughtException', (error) => {
    console.error('💥 Uncaught Exception:', error);
    stop('UNCAUGHT_EXCEPTION', 1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('💥 Unhandled Rejection:', reason);
    stop('UNHANDLED_REJECTION', 1);
  });
}

/**
 * Resolve configuration and serve until the session closes.
 * Resolves with the process exit code.
 */
export async function run(options: RunOptions = {}): Promise<number> {
  let config: Config;
  try {
    config = resolveConfig(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`\n❌ Configuration error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }

  printConfigInfo(config);

  const client = options.createClient
    ? options.createClient(config)
    : new PerplexityApiClient(config);

  if (config.healthCheckOnStart) {
    const health = await client.healthCheck();
    console.error(
      health.ok
        ? `✅ Perplexity API reachable (model: ${health.model})`
        : `⚠️ Perplexity API health check failed: ${health.error}`
    );
  }

  const mcpServer = new McpServer(config, client);

  let exitCode = 0;
  let stopping = false;
  let markStopped: () => void = () => {};
  const stopped = new Promise<void>((resolve) => {
    markStopped = resolve;
  });

  const stop: StopFn = (reason, code) => {
    exitCode = Math.max(exitCode, code);
    if (stopping) {
      return;
    }
    stopping = true;
    console.error(`\n\n📛 Received ${reason}, shutting down...`);
    mcpServer
      .shutdown()
      .catch((error: unknown) => {
        console.error('⚠️ Error during shutdown:', error);
      })
      .finally(markStopped);
  };

  (options.installHandlers ?? installProcessHandlers)(stop);

  if (options.transport) {
    await mcpServer.connect(options.transport);
  } else {
    await mcpServer.start();
  }

  // A failed shutdown never reports the close, so the stop itself also ends the wait
  await Promise.race([mcpServer.closed(), stopped]);

  console.error('👋 Goodbye!\n');
  return exitCode;
}
