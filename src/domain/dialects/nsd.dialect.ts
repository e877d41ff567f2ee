import type { DialectRenderer } from './dialect.types.js';

/** NSD keyword for unauthenticated notify and transfer */
const NO_KEY = 'NOKEY';

/**
 * `nsd.conf` zone pattern.
 */
export const renderNsdZone: DialectRenderer = (zone, dataFile, { masters, tsigKey }) => {
  const key = tsigKey ?? NO_KEY;

  return [
    `# ${zone.originalName}`,
    'zone:',
    `\tname: "${zone.domain}"`,
    `\tzonefile: "${dataFile}"`,
    ...masters.map((m) => `\tallow-notify: ${m} ${key}`),
    ...masters.map((m) => `\trequest-xfr: ${m} ${key}`),
    '',
    '',
  ].join('\n');
};
