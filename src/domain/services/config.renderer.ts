import type { NameserverSpec } from '../entities/nameserver.entity.js';
import type { DialectRenderer, OutputFormat, RenderableZone } from '../dialects/dialect.types.js';
import { renderBindZone } from '../dialects/bind.dialect.js';
import { renderNsdZone } from '../dialects/nsd.dialect.js';
import { zoneFileName } from './zone-naming.js';
import { UnsupportedFormatError } from '../errors.js';

const DIALECTS: Record<OutputFormat, DialectRenderer> = {
  bind: renderBindZone,
  nsd: renderNsdZone,
};

export function isOutputFormat(format: string): format is OutputFormat {
  return Object.prototype.hasOwnProperty.call(DIALECTS, format);
}

export function dataFilePath(directory: string, domain: string): string {
  return `${directory}/${zoneFileName(domain)}`;
}

/**
 * Render the configuration for one nameserver. Zones are emitted in the order
 * given; the whole text is returned so it can be written in one piece.
 */
export function render(
  format: string,
  zones: readonly RenderableZone[],
  nameserver: Pick<NameserverSpec, 'path' | 'masters' | 'tsigKey'>
): string {
  if (!isOutputFormat(format)) {
    throw new UnsupportedFormatError(format);
  }

  const renderZone = DIALECTS[format];
  return zones
    .map((zone) => renderZone(zone, dataFilePath(nameserver.path, zone.domain), nameserver))
    .join('');
}
