import type { DnsRecord } from '../types.js';

/**
 * Capability set every DNS vendor client implements.
 *
 * Failures are thrown as `ProviderError`; see its `kind` for the
 * taxonomy the reconciler relies on.
 */
export interface ProviderClient {
  /** Look up the A record for a hostname. More than one match is an `ambiguous_record` error. */
  findRecord(zoneId: string, hostname: string): Promise<DnsRecord | null>;
  createRecord(zoneId: string, hostname: string, ip: string): Promise<DnsRecord>;
  /** Change the record's content in place, keeping its id and other attributes */
  updateRecord(zoneId: string, recordId: string, ip: string): Promise<DnsRecord>;
}
