import fetch, { AbortError, type RequestInit, type Response } from 'node-fetch';
import { z } from 'zod';
import { logger } from '../logger.js';
import { ProviderError, errorMessage, type ProviderErrorKind } from '../errors.js';
import type { DnsRecord } from '../types.js';
import type { ProviderClient } from './provider.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface CloudflareClientOptions {
  apiToken: string;
  /** 1 means "automatic" to Cloudflare */
  ttl?: number;
  proxied?: boolean;
  timeoutMs?: number;
  baseUrl?: string;
  fetchImpl?: FetchLike;
}

const CLOUDFLARE_API_BASE = 'https://api.cloudflare.com/client/v4';
const DEFAULT_TIMEOUT_MS = 8000;

// 10000: authentication error, 9109: invalid access token, 9106/9103: missing or unknown auth headers
const AUTH_ERROR_CODES = new Set([10000, 9103, 9106, 9109]);
// 81044: record does not exist, 7003: could not route to the object identifier
const MISSING_RESOURCE_CODES = new Set([81044, 7003]);

const cloudflareErrorSchema = z.object({
  code: z.number(),
  message: z.string()
});

const envelopeSchema = z.object({
  success: z.boolean(),
  errors: z.array(cloudflareErrorSchema).default([]),
  result: z.unknown()
});

const dnsRecordSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string(),
  content: z.string(),
  ttl: z.number().optional()
});

type CloudflareDnsRecord = z.infer<typeof dnsRecordSchema>;
type CloudflareApiError = z.infer<typeof cloudflareErrorSchema>;

function toDnsRecord(record: CloudflareDnsRecord): DnsRecord {
  return {
    id: record.id,
    name: record.name,
    type: 'A',
    content: record.content,
    ttl: record.ttl
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function classify(status: number, errors: CloudflareApiError[]): ProviderErrorKind {
  const codes = errors.map((e) => e.code);
  if (status === 401 || status === 403 || codes.some((c) => AUTH_ERROR_CODES.has(c))) {
    return 'auth';
  }
  if (status === 429) {
    return 'rate_limited';
  }
  if (status === 404 || codes.some((c) => MISSING_RESOURCE_CODES.has(c))) {
    return 'not_found';
  }
  return 'transport';
}

/**
 * Cloudflare API v4 client for A records in a single zone.
 * Calls are never retried here; throttling and network failures are
 * reported to the caller as-is.
 */
export class CloudflareClient implements ProviderClient {
  private readonly apiToken: string;
  private readonly baseUrl: string;
  private readonly ttl: number;
  private readonly proxied: boolean;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: CloudflareClientOptions) {
    if (!options.apiToken) {
      throw new Error('Cloudflare API token is required');
    }
    this.apiToken = options.apiToken;
    this.baseUrl = (options.baseUrl ?? CLOUDFLARE_API_BASE).replace(/\/$/, '');
    this.ttl = options.ttl ?? 1;
    this.proxied = options.proxied ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Returns the standard headers required for Cloudflare API requests
   */
  private get headers(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.apiToken}`,
      'Content-Type': 'application/json'
    };
  }

  /**
   * Sends one request, bounded by the configured timeout, and validates
   * the `result` of the response envelope against `schema`.
   */
  private async makeRequest<S extends z.ZodTypeAny>(
    path: string,
    init: RequestInit,
    context: string,
    schema: S
  ): Promise<z.infer<S>> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      logger.debug(`Making request to ${url}`, {
        context,
        method: init.method || 'GET'
      });

      response = await this.fetchImpl(url, {
        ...init,
        headers: this.headers,
        signal: controller.signal
      });
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted || error instanceof AbortError) {
        throw new ProviderError(`${context} timed out after ${this.timeoutMs}ms`, 'transport');
      }
      throw new ProviderError(`${context} failed: ${errorMessage(error)}`, 'transport');
    } finally {
      clearTimeout(timeout);
    }

    const envelope = envelopeSchema.safeParse(parseJson(text));
    if (!response.ok || !envelope.success || !envelope.data.success) {
      const errors = envelope.success ? envelope.data.errors : [];
      const detail = errors.length > 0
        ? errors.map((e) => `${e.code}: ${e.message}`).join(', ')
        : text.trim().slice(0, 200) || response.statusText || 'unknown error';
      const kind = response.ok && errors.length === 0 ? 'transport' : classify(response.status, errors);

      logger.debug('Request failed', {
        context,
        status: response.status,
        kind,
        detail
      });

      throw new ProviderError(
        `${context} failed (HTTP ${response.status}): ${detail}`,
        kind,
        response.status
      );
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new ProviderError(
        `${context} failed: unexpected response shape`,
        'transport',
        response.status
      );
    }
    return result.data;
  }

  async findRecord(zoneId: string, hostname: string): Promise<DnsRecord | null> {
    const query = `type=A&name=${encodeURIComponent(hostname)}`;
    const records = await this.makeRequest(
      `/zones/${encodeURIComponent(zoneId)}/dns_records?${query}`,
      { method: 'GET' },
      'Looking up DNS record',
      z.array(dnsRecordSchema)
    );

    const matches = records.filter((r) => r.type === 'A');
    if (matches.length > 1) {
      throw new ProviderError(
        `Found ${matches.length} A records for ${hostname}, expected at most one`,
        'ambiguous_record'
      );
    }
    return matches.length === 1 ? toDnsRecord(matches[0]) : null;
  }

  async createRecord(zoneId: string, hostname: string, ip: string): Promise<DnsRecord> {
    const record = await this.makeRequest(
      `/zones/${encodeURIComponent(zoneId)}/dns_records`,
      {
        method: 'POST',
        body: JSON.stringify({
          type: 'A',
          name: hostname,
          content: ip,
          ttl: this.ttl,
          proxied: this.proxied
        })
      },
      'Creating DNS record',
      dnsRecordSchema
    );
    return toDnsRecord(record);
  }

  async updateRecord(zoneId: string, recordId: string, ip: string): Promise<DnsRecord> {
    const record = await this.makeRequest(
      `/zones/${encodeURIComponent(zoneId)}/dns_records/${encodeURIComponent(recordId)}`,
      {
        method: 'PATCH',
        body: JSON.stringify({ content: ip })
      },
      'Updating DNS record',
      dnsRecordSchema
    );
    return toDnsRecord(record);
  }
}
