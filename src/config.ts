import * as dotenv from 'dotenv';
import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './core/errors.js';
import { SEARCH_MODELS, SearchModel } from './core/entities/Query.js';

export const API_KEY_ENV = 'PERPLEXITY_API_KEY';
export const DEFAULT_CONFIG_FILE = 'config.txt';

export const DEFAULT_BASE_URL = 'https://api.perplexity.ai';
export const DEFAULT_MODEL: SearchModel = 'sonar';
export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_TEMPERATURE = 0.7;
export const UPSTREAM_TIMEOUT_MS = 30000;

export type CredentialSource = 'env' | 'file-entry' | 'file-plain';

export interface Config {
  readonly apiKey: string;
  readonly credentialSource: CredentialSource;
  readonly baseUrl: string;
  readonly defaultModel: SearchModel;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly timeoutMs: number;
  readonly healthCheckOnStart: boolean;
  readonly server: {
    readonly name: string;
    readonly version: string;
    readonly debug: boolean;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  apiKey: z.string().min(1, 'API key must not be empty'),
  credentialSource: z.enum(['env', 'file-entry', 'file-plain']),
  baseUrl: z.string().url('Invalid base URL format'),
  defaultModel: z.enum(SEARCH_MODELS),
  maxTokens: z.number().int().min(1),
  temperature: z.number().min(0).max(2),
  timeoutMs: z.number().int().positive(),
  healthCheckOnStart: z.boolean(),
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
});

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Credential file path; defaults to PERPLEXITY_CONFIG_FILE or config.txt in the cwd */
  configFile?: string;
  readFile?: (filePath: string) => string;
}

function defaultReadFile(filePath: string): string {
  return readFileSync(filePath, 'utf8');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the credential file, or undefined when it does not exist
 */
function readCredentialFile(
  filePath: string,
  readFile: (filePath: string) => string
): string | undefined {
  try {
    return readFile(filePath);
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`could not read credential file ${filePath}: ${reason}`, error);
  }
}

/**
 * Extract the credential from credential file content.
 * The first PERPLEXITY_API_KEY=value line wins, even when its value is empty.
 * Without such a line, a single bare line is taken as the key itself.
 */
export function parseCredentialFile(
  content: string
): { apiKey: string; source: CredentialSource } | undefined {
  for (const line of content.split(/\r?\n/)) {
    const entries = dotenv.parse(line);
    if (Object.prototype.hasOwnProperty.call(entries, API_KEY_ENV)) {
      return { apiKey: entries[API_KEY_ENV].trim(), source: 'file-entry' };
    }
  }

  const trimmed = content.trim();
  if (trimmed.length === 0 || trimmed.includes('=') || /[\r\n]/.test(trimmed)) {
    return undefined;
  }
  return { apiKey: trimmed, source: 'file-plain' };
}

function getBoolean(env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  return value === 'true' ? true : value === 'false' ? false : defaultValue;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object') {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Resolve configuration from the environment and the credential file.
 * Throws ConfigError when no credential is available or a setting is invalid.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const readFile = options.readFile ?? defaultReadFile;

  let apiKey = env[API_KEY_ENV]?.trim() ?? '';
  let credentialSource: CredentialSource = 'env';

  if (!apiKey) {
    const configFile = path.resolve(
      options.configFile ?? env.PERPLEXITY_CONFIG_FILE ?? DEFAULT_CONFIG_FILE
    );
    const content = readCredentialFile(configFile, readFile);
    const fromFile = content === undefined ? undefined : parseCredentialFile(content);
    if (fromFile) {
      apiKey = fromFile.apiKey;
      credentialSource = fromFile.source;
    }
  }

  if (!apiKey) {
    throw new ConfigError(
      `missing credential: set ${API_KEY_ENV} or put the key in ${DEFAULT_CONFIG_FILE}`
    );
  }

  const rawConfig = {
    apiKey,
    credentialSource,
    baseUrl: (env.PERPLEXITY_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ''),
    defaultModel: DEFAULT_MODEL,
    maxTokens: DEFAULT_MAX_TOKENS,
    temperature: DEFAULT_TEMPERATURE,
    timeoutMs: UPSTREAM_TIMEOUT_MS,
    healthCheckOnStart: getBoolean(env, 'HEALTH_CHECK_ON_START', false),
    server: {
      name: env.SERVER_NAME || 'perplexity-mcp',
      version: env.SERVER_VERSION || '1.0.0',
      debug: getBoolean(env, 'DEBUG', false),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid configuration: ${problems}`, parsed.error.issues);
  }

  return deepFreeze(parsed.data);
}

function maskKey(apiKey: string): string {
  return apiKey.length <= 4 ? '****' : `${apiKey.slice(0, 4)}...`;
}

/**
 * Print configuration to stderr; stdout carries protocol frames
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════╗');
  console.error('║           Perplexity MCP Server - Configuration          ║');
  console.error('╚══════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 API: ${config.baseUrl}`);
  console.error(`🔑 Key: ${maskKey(config.apiKey)} (from ${config.credentialSource})`);
  console.error(`🤖 Defaults: ${config.defaultModel} | ${config.maxTokens} tokens | temperature ${config.temperature}`);
  console.error(`⏱️  Timeout: ${config.timeoutMs / 1000}s`);

  console.error('\n' + '─'.repeat(60));
}
