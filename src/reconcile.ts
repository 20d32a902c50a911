import type { Logger } from 'winston';
import { ProviderError, errorMessage } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import type { ProviderClient } from './providers/provider.js';
import type { DnsRecord, ReconcileAction, UpdateFailure, UpdateResult } from './types.js';
import { isValidIPv4, normalizeHostname } from './validation.js';

export function failure(error: string): UpdateFailure {
  return { success: false, error };
}

/**
 * Updates the record at `record.id`, falling back to a single create when
 * the record vanished between the lookup and the update.
 */
async function updateOrRecreate(
  client: ProviderClient,
  zoneId: string,
  hostname: string,
  record: DnsRecord,
  ip: string,
  log: Logger
): Promise<{ record: DnsRecord; action: ReconcileAction }> {
  try {
    const updated = await client.updateRecord(zoneId, record.id, ip);
    return { record: updated, action: 'updated' };
  } catch (error) {
    if (!(error instanceof ProviderError) || error.kind !== 'not_found') {
      throw error;
    }
    log.warn(`Record ${hostname} disappeared before update, creating it instead`, {
      recordId: record.id
    });
  }

  const created = await client.createRecord(zoneId, hostname, ip);
  return { record: created, action: 'recreated' };
}

/**
 * Make the A record for `hostname` in `zoneId` point at `ip`.
 *
 * Looks the record up fresh on every call, then creates it, updates it,
 * or leaves it alone when it already has the address. Never throws:
 * every failure comes back as `{ success: false }`.
 */
export async function reconcile(
  client: ProviderClient,
  zoneId: string,
  hostname: string,
  ip: string,
  log: Logger = defaultLogger
): Promise<UpdateResult> {
  if (!isValidIPv4(ip)) {
    log.warn('Rejected update with invalid IP address', { hostname, ip });
    return failure(`Invalid IP address: ${ip}`);
  }

  const name = normalizeHostname(hostname);
  if (!name) {
    log.warn('Rejected update with invalid hostname', { hostname, ip });
    return failure(`Invalid hostname: ${hostname}`);
  }

  try {
    const existing = await client.findRecord(zoneId, name);

    let record: DnsRecord;
    let action: ReconcileAction;
    if (!existing) {
      record = await client.createRecord(zoneId, name, ip);
      action = 'created';
    } else if (existing.content === ip) {
      record = existing;
      action = 'unchanged';
    } else {
      ({ record, action } = await updateOrRecreate(client, zoneId, name, existing, ip, log));
    }

    log.info('DNS update successful', {
      hostname: name,
      ip,
      action,
      recordId: record.id,
      previousIp: existing?.content ?? null
    });

    return {
      success: true,
      message: `Updated record ${name} to IP ${ip}`,
      record_id: record.id
    };
  } catch (error) {
    log.error('DNS update failed', {
      hostname: name,
      ip,
      errorKind: error instanceof ProviderError ? error.kind : 'unexpected',
      error: errorMessage(error)
    });
    return failure(`DNS update failed: ${errorMessage(error)}`);
  }
}
