import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@searchwise/shared/src/utils/errors.js';
import type { AppConfig } from './app-config.schema.js';
import { validateAppConfig } from './validators.js';

export interface LoadConfigOptions {
  readonly env?: NodeJS.ProcessEnv;
  /** Optional JSON file with defaults; environment variables win over it. */
  readonly configPath?: string;
}

type ConfigRecord = Record<string, unknown>;

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function compact(record: ConfigRecord): ConfigRecord {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  return raw === 'true' || raw === '1';
}

/**
 * Checks the provider keys for obvious mistakes before any request is made.
 * Returns one message per problem found.
 */
export function validateApiKeys(braveKey: string, openAiKey: string): readonly string[] {
  const issues: string[] = [];

  if (!braveKey) {
    issues.push('BRAVE_API_KEY is not set');
  } else if (braveKey.length < 10) {
    issues.push('BRAVE_API_KEY looks malformed (expected at least 10 characters)');
  }

  if (!openAiKey) {
    issues.push('OPENAI_API_KEY is not set');
  } else if (!openAiKey.startsWith('sk-')) {
    issues.push('OPENAI_API_KEY looks malformed (expected an "sk-" prefix)');
  }

  return issues;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;

  let fileConfig: ConfigRecord = {};
  if (options.configPath) {
    const raw = await readJsonFile(options.configPath);
    if (!isRecord(raw)) {
      throw new ConfigurationError(`Configuration file must contain a JSON object: ${options.configPath}`);
    }
    fileConfig = raw;
  }

  const rawSearch = fileConfig['search'];
  const rawChat = fileConfig['chat'];
  const fileSearch = isRecord(rawSearch) ? rawSearch : {};
  const fileChat = isRecord(rawChat) ? rawChat : {};

  const merged: ConfigRecord = {
    ...fileConfig,
    ...compact({
      contextDetail: env['SEARCHWISE_CONTEXT_DETAIL'],
      autoSearch: readBoolean(env, 'SEARCHWISE_AUTO_SEARCH'),
      mock: readBoolean(env, 'SEARCHWISE_MOCK'),
      transcriptDir: env['SEARCHWISE_TRANSCRIPT_DIR'],
      retryBaseDelayMs: readNumber(env, 'SEARCHWISE_RETRY_BASE_DELAY_MS'),
    }),
    search: {
      ...fileSearch,
      ...compact({
        apiKey: env['BRAVE_API_KEY'],
        count: readNumber(env, 'SEARCHWISE_SEARCH_COUNT'),
        languageHint: env['SEARCHWISE_SEARCH_LANG'],
        safesearch: env['SEARCHWISE_SAFESEARCH'],
      }),
    },
    chat: {
      ...fileChat,
      ...compact({
        apiKey: env['OPENAI_API_KEY'],
        model: env['OPENAI_MODEL'],
        maxTokens: readNumber(env, 'MAX_TOKENS'),
        temperature: readNumber(env, 'TEMPERATURE'),
      }),
    },
  };

  const config = validateAppConfig(merged);

  if (!config.mock) {
    const issues = validateApiKeys(config.search.apiKey, config.chat.apiKey);
    if (issues.length > 0) {
      throw new ConfigurationError(issues.join('; '));
    }
  }

  return config;
}
