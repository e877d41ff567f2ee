import type { DialectRenderer } from './dialect.types.js';

/**
 * `named.conf` secondary zone statement.
 */
export const renderBindZone: DialectRenderer = (zone, dataFile, { masters, tsigKey }) => {
  const sources = masters.map((m) => (tsigKey ? `${m} key ${tsigKey}` : m));

  return [
    `# ${zone.originalName}`,
    `zone "${zone.domain}" {`,
    '\ttype slave;',
    `\tfile "${dataFile}";`,
    `\tmasters { ${sources.join(';')}; };`,
    '};',
    '',
    '',
  ].join('\n');
};
