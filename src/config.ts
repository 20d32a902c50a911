import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import dotenv from 'dotenv';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { Config, LogLevel, RawProviderConfig } from './types.js';

const DEFAULT_CONFIG_PATH = 'config.toml';
const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

const configSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
      log_level: z.enum(LOG_LEVELS).default('info'),
      provider_timeout_ms: z.number().int().positive().default(8000)
    })
    .default({}),
  providers: z
    .array(
      z
        .object({
          name: z.string().min(1),
          type: z.string().min(1)
        })
        .passthrough()
    )
    .min(1, 'at least one provider is required')
});

/**
 * Loads `.env` outside production so CONFIG_PATH and LOG_LEVEL can be set there
 */
export function loadEnvironment(): void {
  if (process.env.NODE_ENV !== 'production') {
    dotenv.config();
  }
}

/**
 * `--config` / `-c` wins over CONFIG_PATH, which wins over ./config.toml
 */
export function resolveConfigPath(argv: string[], env: NodeJS.ProcessEnv = process.env): string {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' }
    },
    strict: false,
    allowPositionals: true
  });
  const fromArgs = typeof values.config === 'string' ? values.config : undefined;
  return fromArgs || env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
}

/**
 * An environment LOG_LEVEL takes precedence over the config file
 */
export function resolveLogLevel(configured: LogLevel, envLevel?: string): LogLevel {
  if (!envLevel) {
    return configured;
  }
  const normalized = envLevel.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (!match) {
    logger.warn(`Invalid log level "${envLevel}", using "${configured}"`);
    return configured;
  }
  return match;
}

export function parseConfig(text: string, source: string): Config {
  let document: unknown;
  try {
    document = parseToml(text);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${source}: ${errorMessage(error)}`);
  }

  const parsed = configSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${source}: ${issues}`);
  }

  const { server, providers } = parsed.data;
  return {
    server: {
      host: server.host,
      port: server.port,
      logLevel: server.log_level,
      providerTimeoutMs: server.provider_timeout_ms
    },
    providers
  };
}

export function loadConfig(path: string): Config {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${path}: ${errorMessage(error)}`);
  }
  return parseConfig(text, path);
}

// Everything else in a provider entry may be a credential
const PUBLIC_PROVIDER_FIELDS = new Set(['name', 'type', 'zone_id']);

/**
 * Startup summary of the configured providers. Only name, type and zone
 * are shown; every other field is masked.
 */
export function describeProviders(providers: RawProviderConfig[]): Record<string, unknown>[] {
  return providers.map((provider) =>
    Object.fromEntries(
      Object.entries(provider).map(([field, value]) => [
        field,
        PUBLIC_PROVIDER_FIELDS.has(field) ? value : '********'
      ])
    )
  );
}
