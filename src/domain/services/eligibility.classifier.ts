import { isSupportedKind, type ZoneRecord, type ZoneServer } from '../entities/zone.entity.js';
import { groupSet, type NameserverIdentity } from '../entities/nameserver.entity.js';

export type EligibilityReason =
  | 'disabled'
  | 'unsupported zone format'
  | 'group match'
  | 'external primary'
  | 'external secondary'
  | 'stealth primary'
  | 'stealth secondary'
  | 'not a nameserver for this zone';

export interface EligibilityDecision {
  included: boolean;
  reason: EligibilityReason;
}

export interface ClassifiedZone {
  record: ZoneRecord;
  decision: EligibilityDecision;
}

const include = (reason: EligibilityReason): EligibilityDecision => ({ included: true, reason });
const exclude = (reason: EligibilityReason): EligibilityDecision => ({ included: false, reason });

/**
 * Scan a server list in order. A stealth entry vetoes the zone even when the
 * host appears later in the list, so the scan stops at whichever comes first.
 */
function scanServers(
  servers: readonly ZoneServer[] | undefined,
  hostname: string
): 'stealth' | 'match' | null {
  for (const server of servers ?? []) {
    if (server.stealth) {
      return 'stealth';
    }
    if (server.name === hostname) {
      return 'match';
    }
  }
  return null;
}

/**
 * Decide whether a nameserver should carry a zone. Rules apply in order and the
 * first one that fires wins.
 */
export function isEligible(record: ZoneRecord, nameserver: NameserverIdentity): EligibilityDecision {
  if (!record.enabled) {
    return exclude('disabled');
  }

  if (!isSupportedKind(record.kind)) {
    return exclude('unsupported zone format');
  }

  // A group miss is not a veto; fall through to the explicit lists
  if (record.nsGroup && groupSet(nameserver).has(record.nsGroup)) {
    return include('group match');
  }

  switch (scanServers(record.externalPrimaries, nameserver.hostname)) {
    case 'stealth':
      return exclude('stealth primary');
    case 'match':
      return include('external primary');
  }

  switch (scanServers(record.externalSecondaries, nameserver.hostname)) {
    case 'stealth':
      return exclude('stealth secondary');
    case 'match':
      return include('external secondary');
  }

  return exclude('not a nameserver for this zone');
}

/**
 * Classify every zone for one nameserver, keeping the source order.
 */
export function classifyZones(
  records: readonly ZoneRecord[],
  nameserver: NameserverIdentity
): ClassifiedZone[] {
  return records.map((record) => ({ record, decision: isEligible(record, nameserver) }));
}
