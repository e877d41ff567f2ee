/**
 * Zone formats understood by the naming and rendering pipeline.
 */
export type ZoneKind = 'forward' | 'ipv4' | 'ipv6';

export const ZONE_KINDS: readonly ZoneKind[] = ['forward', 'ipv4', 'ipv6'];

/**
 * A primary or secondary server listed on a zone.
 */
export interface ZoneServer {
  name: string;
  /** Hidden from the zone's published NS records */
  stealth: boolean;
}

/**
 * A zone as served by the DNS-management system, normalized for classification.
 */
export interface ZoneRecord {
  /** Domain name for forward zones, network in CIDR notation for reverse zones */
  readonly name: string;
  /** Unrecognized formats are kept verbatim and never served */
  readonly kind: ZoneKind | (string & {});
  readonly enabled: boolean;
  readonly nsGroup?: string;
  readonly externalPrimaries: readonly ZoneServer[];
  readonly externalSecondaries: readonly ZoneServer[];
}

/**
 * A named set of secondary servers a zone can be assigned to as a whole.
 */
export interface NsGroup {
  readonly name: string;
  /** Host names of every secondary in the group, grid members and external servers alike */
  readonly secondaries: readonly string[];
}

export function isSupportedKind(kind: string): kind is ZoneKind {
  return (ZONE_KINDS as readonly string[]).includes(kind);
}

/**
 * Build an immutable zone record, filling absent lists.
 */
export function createZoneRecord(input: {
  name: string;
  kind: string;
  enabled?: boolean;
  nsGroup?: string | null;
  externalPrimaries?: ZoneServer[] | null;
  externalSecondaries?: ZoneServer[] | null;
}): ZoneRecord {
  const freezeServers = (servers: ZoneServer[] | null | undefined): readonly ZoneServer[] =>
    Object.freeze((servers ?? []).map((s) => Object.freeze({ name: s.name, stealth: s.stealth })));

  return Object.freeze({
    name: input.name,
    kind: input.kind,
    enabled: input.enabled ?? true,
    ...(input.nsGroup ? { nsGroup: input.nsGroup } : {}),
    externalPrimaries: freezeServers(input.externalPrimaries),
    externalSecondaries: freezeServers(input.externalSecondaries),
  });
}
