import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { logger } from '../logger.js';
import type { RawProviderConfig } from '../types.js';
import { CloudflareClient, type FetchLike } from './cloudflare.js';
import type { ProviderClient } from './provider.js';

export type { ProviderClient } from './provider.js';

export const PROVIDER_KINDS = ['cloudflare'] as const;
export type ProviderKind = (typeof PROVIDER_KINDS)[number];

const cloudflareConfigSchema = z.object({
  name: z.string().min(1),
  type: z.literal('cloudflare'),
  api_key: z.string().min(1, 'api_key is required'),
  zone_id: z.string().min(1, 'zone_id is required'),
  ttl: z.number().int().min(1).default(1),
  proxied: z.boolean().default(false)
});

const providerConfigSchema = z.discriminatedUnion('type', [cloudflareConfigSchema]);

export type ProviderConfig = z.infer<typeof providerConfigSchema>;

export interface ClientOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/** A configured provider: the client plus the zone it manages */
export interface RegisteredProvider {
  name: string;
  kind: ProviderKind;
  zoneId: string;
  client: ProviderClient;
}

function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}

/**
 * Checks one `[[providers]]` entry against the fields its kind requires.
 */
export function parseProviderConfig(raw: RawProviderConfig): ProviderConfig {
  if (!isProviderKind(raw.type)) {
    throw new ConfigError(
      `Provider "${raw.name}": unknown type "${raw.type}" (supported: ${PROVIDER_KINDS.join(', ')})`
    );
  }

  const parsed = providerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Provider "${raw.name}": ${issues}`);
  }
  return parsed.data;
}

export function createProviderClient(config: ProviderConfig, options: ClientOptions): ProviderClient {
  switch (config.type) {
    case 'cloudflare':
      return new CloudflareClient({
        apiToken: config.api_key,
        ttl: config.ttl,
        proxied: config.proxied,
        timeoutMs: options.timeoutMs,
        fetchImpl: options.fetchImpl
      });
  }
}

/**
 * Maps the provider token from the request path to a configured client.
 * Built once at startup and never mutated.
 */
export class ProviderRegistry {
  private readonly providers: ReadonlyMap<string, RegisteredProvider>;

  constructor(providers: RegisteredProvider[]) {
    const byName = new Map<string, RegisteredProvider>();
    for (const provider of providers) {
      if (byName.has(provider.name)) {
        throw new ConfigError(`Duplicate provider name: ${provider.name}`);
      }
      byName.set(provider.name, provider);
    }
    this.providers = byName;
  }

  /**
   * Validates every entry and constructs its client. Throws `ConfigError`
   * on the first entry that does not fit its kind.
   */
  static fromConfig(configs: RawProviderConfig[], options: ClientOptions): ProviderRegistry {
    const registered = configs.map((raw) => {
      const config = parseProviderConfig(raw);
      logger.debug(`Registering provider ${config.name}`, {
        type: config.type,
        zoneId: config.zone_id
      });
      return {
        name: config.name,
        kind: config.type,
        zoneId: config.zone_id,
        client: createProviderClient(config, options)
      };
    });
    return new ProviderRegistry(registered);
  }

  resolve(name: string): RegisteredProvider | undefined {
    return this.providers.get(name);
  }

  names(): string[] {
    return Array.from(this.providers.keys());
  }
}
