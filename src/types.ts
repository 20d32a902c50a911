export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * An A record as reported by the provider. Never cached locally;
 * the provider's zone is the source of truth.
 */
export interface DnsRecord {
  id: string;
  name: string;
  type: 'A';
  content: string;
  ttl?: number;
}

export interface UpdateSuccess {
  success: true;
  message: string;
  record_id: string;
}

export interface UpdateFailure {
  success: false;
  error: string;
}

/** JSON envelope returned by the DDNS endpoint */
export type UpdateResult = UpdateSuccess | UpdateFailure;

export type ReconcileAction = 'unchanged' | 'updated' | 'created' | 'recreated';

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  providerTimeoutMs: number;
}

/**
 * A `[[providers]]` entry before its kind-specific fields are checked.
 * The registry validates the rest.
 */
export interface RawProviderConfig {
  name: string;
  type: string;
  [field: string]: unknown;
}

export interface Config {
  server: ServerConfig;
  providers: RawProviderConfig[];
}
