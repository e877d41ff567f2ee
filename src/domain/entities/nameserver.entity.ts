/**
 * A secondary nameserver to generate configuration for.
 */
export interface NameserverSpec {
  /** Key under `nameservers:` in the run configuration, `default` for the single shape */
  key: string;
  /** Matched against the zone's primary and secondary lists */
  hostname: string;
  group?: string;
  groups: string[];
  /** Output dialect, checked when rendering */
  format: string;
  /** Directory holding the zone data files */
  path: string;
  outputFile: string;
  /** Zone transfer sources, in configured order */
  masters: string[];
  tsigKey?: string;
  /** Also treat this host as a member of every NS group listing it as a secondary */
  discoverGroups: boolean;
}

/**
 * The fields eligibility depends on.
 */
export type NameserverIdentity = Pick<NameserverSpec, 'hostname' | 'group' | 'groups'>;

/**
 * Union of the single `group` and the `groups` list.
 */
export function groupSet(nameserver: Pick<NameserverSpec, 'group' | 'groups'>): Set<string> {
  const groups = new Set<string>(nameserver.groups ?? []);
  if (nameserver.group) {
    groups.add(nameserver.group);
  }
  return groups;
}
