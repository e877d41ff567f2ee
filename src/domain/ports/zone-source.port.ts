import type { NsGroup, ZoneRecord } from '../entities/zone.entity.js';

/**
 * Fields the pipeline reads from each zone.
 */
export const ZONE_FIELDS = [
  'fqdn',
  'zone_format',
  'disable',
  'ns_group',
  'external_primaries',
  'external_secondaries',
] as const;

export type ZoneField = (typeof ZONE_FIELDS)[number];

/**
 * Read access to the DNS-management system holding the zones.
 */
export interface IZoneSource {
  readonly name: string;

  /**
   * List every authoritative zone in a DNS view, in the system's order
   */
  fetchZones(view: string, fields: readonly ZoneField[]): Promise<ZoneRecord[]>;

  /**
   * List nameserver groups with their secondaries
   */
  fetchNsGroups(): Promise<NsGroup[]>;
}
