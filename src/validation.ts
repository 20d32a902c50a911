import { isIPv4 } from 'node:net';

const MAX_HOSTNAME_LENGTH = 253;
const LABEL_PATTERN = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/;

export function isValidIPv4(ip: string): boolean {
  return isIPv4(ip);
}

/**
 * Lowercases a hostname and strips one trailing dot.
 * Returns null when the result is not a usable record name.
 */
export function normalizeHostname(hostname: string): string | null {
  const name = hostname.toLowerCase().replace(/\.$/, '');
  if (!name || name.length > MAX_HOSTNAME_LENGTH || !name.includes('.')) {
    return null;
  }

  const labels = name.split('.');
  const valid = labels.every((label, index) =>
    index === 0 && label === '*' ? true : LABEL_PATTERN.test(label)
  );

  return valid ? name : null;
}
