export type ProviderErrorKind =
  | 'auth'
  | 'rate_limited'
  | 'not_found'
  | 'transport'
  | 'ambiguous_record';

/**
 * Raised by provider clients. The reconciler reads only `kind`;
 * the message is what ends up in the user-facing error string.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * Configuration shape errors. Only raised during startup.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
