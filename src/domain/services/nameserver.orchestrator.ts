import type { IZoneSource } from '../ports/zone-source.port.js';
import { ZONE_FIELDS } from '../ports/zone-source.port.js';
import type { NsGroup, ZoneRecord } from '../entities/zone.entity.js';
import { isSupportedKind } from '../entities/zone.entity.js';
import type { NameserverIdentity, NameserverSpec } from '../entities/nameserver.entity.js';
import type { RenderableZone } from '../dialects/dialect.types.js';
import { classifyZones } from './eligibility.classifier.js';
import { canonicalDomain } from './zone-naming.js';
import { render } from './config.renderer.js';
import { ConfigError, NamingError, errorMessage, isFatalError } from '../errors.js';
import { writeConfigFile } from '../../adapters/storage/config-writer.js';
import { silentLogger, type Logger } from '../../utils/logger.js';

export interface RunOptions {
  /** DNS view to read zones from */
  view: string;
  nameservers: NameserverSpec[];
}

export interface OrchestratorOptions {
  logger?: Logger;
  /** Collect rendered output instead of writing files */
  dryRun?: boolean;
  writeFile?: (filePath: string, content: string) => void;
}

export interface NameserverResult {
  key: string;
  hostname: string;
  outputFile: string;
  included: number;
  excluded: number;
  /** Included zones left out because their name could not be canonicalized */
  skipped: number;
  /** Rendered configuration, set on dry runs */
  output?: string;
  /** Set when this nameserver failed; other nameservers are unaffected */
  error?: string;
}

export interface RunResult {
  zoneCount: number;
  /** Zones whose domain name could not be derived, excluded everywhere */
  unnamedZones: string[];
  nameservers: NameserverResult[];
}

/**
 * Drives a full run: fetch zones once, then classify, render and write per nameserver.
 */
export class NameserverOrchestrator {
  private readonly logger: Logger;
  private readonly dryRun: boolean;
  private readonly writeFile: (filePath: string, content: string) => void;

  constructor(
    private readonly source: IZoneSource,
    options: OrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.dryRun = options.dryRun ?? false;
    this.writeFile = options.writeFile ?? writeConfigFile;
  }

  async run(options: RunOptions): Promise<RunResult> {
    this.assertRunnable(options.nameservers);

    // One shared fetch; a transport failure aborts before any file is touched
    const zones = await this.source.fetchZones(options.view, ZONE_FIELDS);
    this.logger.debug(`Fetched ${zones.length} zones from ${this.source.name} view "${options.view}"`);

    const nsGroups = options.nameservers.some((ns) => ns.discoverGroups)
      ? await this.source.fetchNsGroups()
      : [];

    const { domains, unnamed } = this.canonicalizeAll(zones);

    const results: NameserverResult[] = [];
    for (const nameserver of options.nameservers) {
      results.push(this.processNameserver(nameserver, zones, domains, nsGroups));
    }

    return { zoneCount: zones.length, unnamedZones: unnamed, nameservers: results };
  }

  private assertRunnable(nameservers: NameserverSpec[]): void {
    if (nameservers.length === 0) {
      throw new ConfigError('no nameservers configured');
    }
    for (const ns of nameservers) {
      if (!ns.hostname) {
        throw new ConfigError(`nameserver "${ns.key}" has no hostname`);
      }
      if (!ns.outputFile) {
        throw new ConfigError(`nameserver "${ns.key}" has no output file`);
      }
    }
  }

  /**
   * Derive the domain name of every servable zone once per run. Failures drop
   * the zone for all nameservers.
   */
  private canonicalizeAll(zones: readonly ZoneRecord[]): {
    domains: Map<ZoneRecord, string>;
    unnamed: string[];
  } {
    const domains = new Map<ZoneRecord, string>();
    const unnamed: string[] = [];

    for (const zone of zones) {
      if (!zone.enabled || !isSupportedKind(zone.kind)) {
        continue;
      }
      try {
        domains.set(zone, canonicalDomain(zone));
      } catch (error) {
        if (!(error instanceof NamingError)) {
          throw error;
        }
        this.logger.info(`Skipping zone: ${error.message}`);
        unnamed.push(zone.name);
      }
    }

    return { domains, unnamed };
  }

  private processNameserver(
    nameserver: NameserverSpec,
    zones: readonly ZoneRecord[],
    domains: ReadonlyMap<ZoneRecord, string>,
    nsGroups: readonly NsGroup[]
  ): NameserverResult {
    const result: NameserverResult = {
      key: nameserver.key,
      hostname: nameserver.hostname,
      outputFile: nameserver.outputFile,
      included: 0,
      excluded: 0,
      skipped: 0,
    };

    this.logger.info(`# exporting data for ${nameserver.hostname}`);

    const identity: NameserverIdentity = {
      hostname: nameserver.hostname,
      group: nameserver.group,
      groups: nameserver.discoverGroups
        ? [...nameserver.groups, ...discoverGroups(nameserver.hostname, nsGroups)]
        : nameserver.groups,
    };

    const eligible: RenderableZone[] = [];
    for (const { record, decision } of classifyZones(zones, identity)) {
      if (!decision.included) {
        this.logger.debug(`Exclude ${record.name} - ${decision.reason}`);
        result.excluded++;
        continue;
      }

      const domain = domains.get(record);
      if (domain === undefined) {
        result.skipped++;
        continue;
      }

      this.logger.debug(`Include ${record.name} - ${decision.reason}`);
      this.logger.info(`${record.name} (${domain})`);
      eligible.push({ originalName: record.name, domain });
    }
    result.included = eligible.length;
    if (eligible.length === 0 && zones.length > 0) {
      this.logger.warn(`${nameserver.key}: no zones found for ${nameserver.hostname}`);
    }

    try {
      const text = render(nameserver.format, eligible, nameserver);
      if (this.dryRun) {
        result.output = text;
      } else {
        this.writeFile(nameserver.outputFile, text);
      }
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      result.error = errorMessage(error);
      this.logger.error(`${nameserver.key} (${nameserver.hostname}): ${result.error}`);
    }

    return result;
  }
}

/**
 * Names of the NS groups that list a host among their secondaries.
 */
export function discoverGroups(hostname: string, nsGroups: readonly NsGroup[]): string[] {
  return nsGroups.filter((g) => g.secondaries.includes(hostname)).map((g) => g.name);
}
