import { ProviderError } from '../src/errors.js';
import type { ProviderClient } from '../src/providers/provider.js';
import type { DnsRecord } from '../src/types.js';

type Operation = 'find' | 'create' | 'update';

/**
 * ProviderClient double backed by a map of records per zone.
 * Counts calls and can be told to fail the next call of an operation.
 */
export class InMemoryProvider implements ProviderClient {
  readonly calls: Record<Operation, number> = { find: 0, create: 0, update: 0 };
  private readonly zones = new Map<string, DnsRecord[]>();
  private readonly failures = new Map<Operation, ProviderError>();
  private nextId = 1;
  /** Runs at the start of every update, after the call is counted */
  beforeUpdate?: (zoneId: string, recordId: string) => void;

  seed(zoneId: string, hostname: string, content: string): DnsRecord {
    const record: DnsRecord = { id: `rec-${this.nextId++}`, name: hostname, type: 'A', content };
    this.records(zoneId).push(record);
    return record;
  }

  records(zoneId: string): DnsRecord[] {
    let records = this.zones.get(zoneId);
    if (!records) {
      records = [];
      this.zones.set(zoneId, records);
    }
    return records;
  }

  remove(zoneId: string, recordId: string): void {
    const records = this.records(zoneId);
    const index = records.findIndex((r) => r.id === recordId);
    if (index >= 0) {
      records.splice(index, 1);
    }
  }

  failNext(operation: Operation, error: ProviderError): void {
    this.failures.set(operation, error);
  }

  get mutations(): number {
    return this.calls.create + this.calls.update;
  }

  private takeFailure(operation: Operation): void {
    const error = this.failures.get(operation);
    if (error) {
      this.failures.delete(operation);
      throw error;
    }
  }

  async findRecord(zoneId: string, hostname: string): Promise<DnsRecord | null> {
    this.calls.find++;
    this.takeFailure('find');
    const matches = this.records(zoneId).filter((r) => r.name === hostname);
    if (matches.length > 1) {
      throw new ProviderError(`Found ${matches.length} A records for ${hostname}`, 'ambiguous_record');
    }
    return matches.length === 1 ? { ...matches[0] } : null;
  }

  async createRecord(zoneId: string, hostname: string, ip: string): Promise<DnsRecord> {
    this.calls.create++;
    this.takeFailure('create');
    return { ...this.seed(zoneId, hostname, ip) };
  }

  async updateRecord(zoneId: string, recordId: string, ip: string): Promise<DnsRecord> {
    this.calls.update++;
    this.beforeUpdate?.(zoneId, recordId);
    this.takeFailure('update');
    const record = this.records(zoneId).find((r) => r.id === recordId);
    if (!record) {
      throw new ProviderError(`Record ${recordId} does not exist`, 'not_found', 404);
    }
    record.content = ip;
    return { ...record };
  }
}
