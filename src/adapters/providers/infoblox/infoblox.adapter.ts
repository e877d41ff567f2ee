import { z } from 'zod';
import type { IZoneSource, ZoneField } from '../../../domain/ports/zone-source.port.js';
import { createZoneRecord, type NsGroup, type ZoneKind, type ZoneRecord } from '../../../domain/entities/zone.entity.js';
import { TransportError, errorMessage } from '../../../domain/errors.js';
import { silentLogger, type Logger } from '../../../utils/logger.js';

export interface InfobloxCredentials {
  host: string;
  port: number;
  wapiVersion: string;
  username: string;
  password: string;
  /** Objects per WAPI page */
  pageSize?: number;
}

const DEFAULT_PAGE_SIZE = 1000;

const ZONE_FORMATS: Record<string, ZoneKind> = {
  FORWARD: 'forward',
  IPV4: 'ipv4',
  IPV6: 'ipv6',
};

const memberServerSchema = z.object({
  name: z.string(),
  stealth: z.boolean().optional(),
});

export const wapiZoneSchema = z.object({
  fqdn: z.string(),
  zone_format: z.string(),
  disable: z.boolean().optional(),
  ns_group: z.string().nullish(),
  external_primaries: z.array(memberServerSchema).optional(),
  external_secondaries: z.array(memberServerSchema).optional(),
});

export const wapiNsGroupSchema = z.object({
  name: z.string(),
  grid_secondaries: z.array(memberServerSchema).optional(),
  external_secondaries: z.array(memberServerSchema).optional(),
});

export type WapiZone = z.infer<typeof wapiZoneSchema>;
export type WapiNsGroup = z.infer<typeof wapiNsGroupSchema>;

const wapiErrorSchema = z.object({
  Error: z.string().optional(),
  text: z.string().optional(),
});

const pagedResultSchema = z.object({
  result: z.array(z.unknown()),
  next_page_id: z.string().optional(),
});

/**
 * Normalize a WAPI `zone_auth` object.
 */
export function toZoneRecord(zone: WapiZone): ZoneRecord {
  const servers = (list: WapiZone['external_primaries']) =>
    (list ?? []).map((s) => ({ name: s.name, stealth: s.stealth ?? false }));

  return createZoneRecord({
    name: zone.fqdn,
    kind: ZONE_FORMATS[zone.zone_format] ?? zone.zone_format,
    enabled: !zone.disable,
    nsGroup: zone.ns_group,
    externalPrimaries: servers(zone.external_primaries),
    externalSecondaries: servers(zone.external_secondaries),
  });
}

export function toNsGroup(group: WapiNsGroup): NsGroup {
  return Object.freeze({
    name: group.name,
    secondaries: Object.freeze([
      ...(group.grid_secondaries ?? []).map((s) => s.name),
      ...(group.external_secondaries ?? []).map((s) => s.name),
    ]),
  });
}

/**
 * Read-only client for the Infoblox WAPI REST interface.
 */
export class InfobloxAdapter implements IZoneSource {
  readonly name = 'infoblox';
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly pageSize: number;

  constructor(
    credentials: InfobloxCredentials,
    private readonly logger: Logger = silentLogger
  ) {
    this.baseUrl = `https://${credentials.host}:${credentials.port}/wapi/v${credentials.wapiVersion}`;
    this.authorization =
      'Basic ' + Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
    this.pageSize = credentials.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  private async request(objectType: string, params: Record<string, string>): Promise<unknown> {
    const url = `${this.baseUrl}/${objectType}?${new URLSearchParams(params).toString()}`;

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          Authorization: this.authorization,
          Accept: 'application/json',
        },
      });
      text = await response.text();
    } catch (error) {
      throw new TransportError(`Failed to reach Infoblox at ${this.baseUrl}: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new TransportError(
        `Infoblox API error (${response.status}) on ${objectType}: ${describeError(text, response.statusText)}`,
        response.status
      );
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new TransportError(`Infoblox returned invalid JSON for ${objectType}`, response.status, { cause: error });
    }
  }

  /**
   * Fetch every object of a type, following WAPI paging.
   */
  private async fetchAll<T>(
    objectType: string,
    item: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: Record<string, string>
  ): Promise<T[]> {
    const items = z.array(item);
    const results: T[] = [];
    let pageId: string | undefined;

    do {
      const query: Record<string, string> = pageId
        ? { _page_id: pageId }
        : { ...params, _paging: '1', _return_as_object: '1', _max_results: String(this.pageSize) };

      const body = await this.request(objectType, query);
      const page = pagedResultSchema.safeParse(body);
      if (!page.success) {
        throw new TransportError(`Unexpected ${objectType} response from Infoblox: ${page.error.message}`);
      }
      const parsed = items.safeParse(page.data.result);
      if (!parsed.success) {
        throw new TransportError(`Unexpected ${objectType} object from Infoblox: ${parsed.error.message}`);
      }

      results.push(...parsed.data);
      pageId = page.data.next_page_id;
      this.logger.debug(`Fetched ${parsed.data.length} ${objectType} objects${pageId ? ', more pending' : ''}`);
    } while (pageId);

    return results;
  }

  async fetchZones(view: string, fields: readonly ZoneField[]): Promise<ZoneRecord[]> {
    const zones = await this.fetchAll('zone_auth', wapiZoneSchema, {
      view,
      _return_fields: fields.join(','),
    });
    return zones.map(toZoneRecord);
  }

  async fetchNsGroups(): Promise<NsGroup[]> {
    const groups = await this.fetchAll('nsgroup', wapiNsGroupSchema, {
      _return_fields: 'name,grid_secondaries,external_secondaries',
    });
    return groups.map(toNsGroup);
  }
}

/**
 * WAPI errors come back as JSON with `Error` and `text`; proxies may send plain text.
 */
function describeError(body: string, fallback: string): string {
  const raw = body.trim() || fallback;
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return raw;
  }

  const result = wapiErrorSchema.safeParse(parsed);
  return result.success ? (result.data.text ?? result.data.Error ?? raw) : raw;
}
