import type { NameserverSpec } from '../entities/nameserver.entity.js';

export type OutputFormat = 'bind' | 'nsd';

/**
 * A zone ready to render: its name in the DNS-management system and its domain name.
 */
export interface RenderableZone {
  originalName: string;
  domain: string;
}

export type TransferSettings = Pick<NameserverSpec, 'masters' | 'tsigKey'>;

/**
 * Renders one zone block. `dataFile` is already joined and sanitized.
 */
export type DialectRenderer = (zone: RenderableZone, dataFile: string, transfer: TransferSettings) => string;
