import { describe, it, expect } from 'vitest';
import { NameserverOrchestrator, discoverGroups } from '../nameserver.orchestrator.js';
import { createZoneRecord } from '../../entities/zone.entity.js';
import type { NameserverSpec } from '../../entities/nameserver.entity.js';
import { ConfigError, TransportError } from '../../errors.js';
import { ZONE_FIELDS } from '../../ports/zone-source.port.js';
import { createLogger } from '../../../utils/logger.js';
import { InMemoryZoneSource } from '../../../__tests__/helpers/in-memory-zone-source.js';

const zones = [
  createZoneRecord({ name: 'a.example', kind: 'forward', nsGroup: 'sec-group' }),
  createZoneRecord({ name: 'b.example', kind: 'forward', enabled: false, nsGroup: 'sec-group' }),
  createZoneRecord({
    name: 'c.example',
    kind: 'forward',
    externalSecondaries: [{ name: 'ns1.example.org', stealth: false }],
  }),
  createZoneRecord({
    name: 'd.example',
    kind: 'forward',
    externalPrimaries: [
      { name: 'other', stealth: true },
      { name: 'ns1.example.org', stealth: false },
    ],
  }),
  createZoneRecord({ name: '192.0.2.0/24', kind: 'ipv4', nsGroup: 'sec-group' }),
  createZoneRecord({ name: 'bogus/24', kind: 'ipv4', nsGroup: 'sec-group' }),
];

function nameserver(overrides: Partial<NameserverSpec> = {}): NameserverSpec {
  return {
    key: 'ns1',
    hostname: 'ns1.example.org',
    group: 'sec-group',
    groups: [],
    format: 'bind',
    path: '/var/lib/bind/sec',
    outputFile: '/etc/bind/secondary.conf',
    masters: ['192.0.2.53'],
    tsigKey: 'xfr-key',
    discoverGroups: false,
    ...overrides,
  };
}

function recordingWriter() {
  const files = new Map<string, string>();
  return { files, writeFile: (filePath: string, content: string) => void files.set(filePath, content) };
}

describe('NameserverOrchestrator', () => {
  it('writes the zones a nameserver is eligible for, in source order', async () => {
    const source = new InMemoryZoneSource(zones);
    const { files, writeFile } = recordingWriter();
    const orchestrator = new NameserverOrchestrator(source, { writeFile });

    const result = await orchestrator.run({ view: 'default', nameservers: [nameserver()] });

    expect(files.get('/etc/bind/secondary.conf')).toBe(
      [
        '# a.example',
        'zone "a.example" {',
        '\ttype slave;',
        '\tfile "/var/lib/bind/sec/a.example";',
        '\tmasters { 192.0.2.53 key xfr-key; };',
        '};',
        '',
        '# c.example',
        'zone "c.example" {',
        '\ttype slave;',
        '\tfile "/var/lib/bind/sec/c.example";',
        '\tmasters { 192.0.2.53 key xfr-key; };',
        '};',
        '',
        '# 192.0.2.0/24',
        'zone "2.0.192.in-addr.arpa" {',
        '\ttype slave;',
        '\tfile "/var/lib/bind/sec/2.0.192.in-addr.arpa";',
        '\tmasters { 192.0.2.53 key xfr-key; };',
        '};',
        '',
        '',
      ].join('\n')
    );
    expect(result).toEqual({
      zoneCount: 6,
      unnamedZones: ['bogus/24'],
      nameservers: [
        {
          key: 'ns1',
          hostname: 'ns1.example.org',
          outputFile: '/etc/bind/secondary.conf',
          included: 3,
          excluded: 2,
          skipped: 1,
        },
      ],
    });
  });

  it('fetches zones once for all nameservers', async () => {
    const source = new InMemoryZoneSource(zones);
    const { writeFile } = recordingWriter();
    const orchestrator = new NameserverOrchestrator(source, { writeFile });

    await orchestrator.run({
      view: 'internal',
      nameservers: [nameserver(), nameserver({ key: 'ns2', outputFile: '/etc/nsd/secondary.conf', format: 'nsd' })],
    });

    expect(source.zoneRequests).toEqual([{ view: 'internal', fields: ZONE_FIELDS }]);
    expect(source.nsGroupRequests).toBe(0);
  });

  it('isolates an unsupported format to its own nameserver', async () => {
    const source = new InMemoryZoneSource(zones);
    const { files, writeFile } = recordingWriter();
    const lines: string[] = [];
    const orchestrator = new NameserverOrchestrator(source, {
      writeFile,
      logger: createLogger(0, (line) => lines.push(line)),
    });

    const result = await orchestrator.run({
      view: 'default',
      nameservers: [
        nameserver({ key: 'ns1', format: 'djbdns', outputFile: '/etc/ns1.conf' }),
        nameserver({ key: 'ns2', format: 'nsd', outputFile: '/etc/ns2.conf' }),
      ],
    });

    expect(result.nameservers.map((ns) => ns.error)).toEqual(['Unknown configuration format: djbdns', undefined]);
    expect([...files.keys()]).toEqual(['/etc/ns2.conf']);
    expect(lines).toEqual(['ERROR: ns1 (ns1.example.org): Unknown configuration format: djbdns']);
  });

  it('records write failures per nameserver', async () => {
    const source = new InMemoryZoneSource(zones);
    const written: string[] = [];
    const orchestrator = new NameserverOrchestrator(source, {
      writeFile: (filePath) => {
        if (filePath === '/readonly/ns1.conf') {
          throw new Error('EACCES: permission denied');
        }
        written.push(filePath);
      },
    });

    const result = await orchestrator.run({
      view: 'default',
      nameservers: [
        nameserver({ key: 'ns1', outputFile: '/readonly/ns1.conf' }),
        nameserver({ key: 'ns2', outputFile: '/etc/ns2.conf' }),
      ],
    });

    expect(result.nameservers[0].error).toBe('EACCES: permission denied');
    expect(result.nameservers[1].error).toBeUndefined();
    expect(written).toEqual(['/etc/ns2.conf']);
  });

  it('aborts the run on transport failures without writing', async () => {
    const source = new InMemoryZoneSource([], [], new TransportError('Infoblox API error (401)', 401));
    const { files, writeFile } = recordingWriter();
    const orchestrator = new NameserverOrchestrator(source, { writeFile });

    await expect(orchestrator.run({ view: 'default', nameservers: [nameserver()] })).rejects.toThrow(TransportError);
    expect(files.size).toBe(0);
  });

  it('rejects an empty nameserver list before fetching', async () => {
    const source = new InMemoryZoneSource(zones);
    const orchestrator = new NameserverOrchestrator(source);

    await expect(orchestrator.run({ view: 'default', nameservers: [] })).rejects.toThrow(ConfigError);
    expect(source.zoneRequests).toHaveLength(0);
  });

  it('rejects a nameserver without an output file', async () => {
    const source = new InMemoryZoneSource(zones);
    const orchestrator = new NameserverOrchestrator(source);

    await expect(
      orchestrator.run({ view: 'default', nameservers: [nameserver({ outputFile: '' })] })
    ).rejects.toThrow('nameserver "ns1" has no output file');
  });

  it('returns the rendered text instead of writing on dry runs', async () => {
    const source = new InMemoryZoneSource(zones.slice(0, 1));
    const { files, writeFile } = recordingWriter();
    const orchestrator = new NameserverOrchestrator(source, { writeFile, dryRun: true });

    const result = await orchestrator.run({
      view: 'default',
      nameservers: [nameserver({ format: 'nsd', path: '/var/nsd', tsigKey: undefined })],
    });

    expect(files.size).toBe(0);
    expect(result.nameservers[0].output).toBe(
      '# a.example\nzone:\n\tname: "a.example"\n\tzonefile: "/var/nsd/a.example"\n' +
        '\tallow-notify: 192.0.2.53 NOKEY\n\trequest-xfr: 192.0.2.53 NOKEY\n\n'
    );
  });

  it('adds discovered NS groups when asked to', async () => {
    const source = new InMemoryZoneSource(zones, [
      { name: 'sec-group', secondaries: ['ns7.example.org'] },
      { name: 'unused', secondaries: [] },
    ]);
    const orchestrator = new NameserverOrchestrator(source, { dryRun: true });

    const result = await orchestrator.run({
      view: 'default',
      nameservers: [nameserver({ hostname: 'ns7.example.org', group: undefined, discoverGroups: true })],
    });

    expect(source.nsGroupRequests).toBe(1);
    expect(result.nameservers[0].included).toBe(2);
    expect(result.nameservers[0].output?.split('\n').filter((l) => l.startsWith('#'))).toEqual([
      '# a.example',
      '# 192.0.2.0/24',
    ]);
  });

  it('logs decisions at debug level and naming failures at info level', async () => {
    const source = new InMemoryZoneSource(zones);
    const lines: string[] = [];
    const orchestrator = new NameserverOrchestrator(source, {
      dryRun: true,
      logger: createLogger(2, (line) => lines.push(line)),
    });

    await orchestrator.run({ view: 'default', nameservers: [nameserver()] });

    expect(lines).toContain(
      'Skipping zone: Cannot derive domain name for zone "bogus/24": not a valid IPv4 address: bogus'
    );
    expect(lines).toContain('DEBUG: Exclude b.example - disabled');
    expect(lines).toContain('DEBUG: Exclude d.example - stealth primary');
    expect(lines).toContain('DEBUG: Include c.example - external secondary');
    expect(lines).toContain('192.0.2.0/24 (2.0.192.in-addr.arpa)');
  });

  it('warns when a nameserver ends up with no zones', async () => {
    const source = new InMemoryZoneSource(zones);
    const lines: string[] = [];
    const orchestrator = new NameserverOrchestrator(source, {
      dryRun: true,
      logger: createLogger(0, (line) => lines.push(line)),
    });

    const result = await orchestrator.run({
      view: 'default',
      nameservers: [nameserver({ key: 'ns9', hostname: 'ns9.example.org', group: undefined })],
    });

    expect(lines).toEqual(['WARNING: ns9: no zones found for ns9.example.org']);
    expect(result.nameservers[0].output).toBe('');
  });

  it('stays quiet below info verbosity', async () => {
    const source = new InMemoryZoneSource(zones);
    const lines: string[] = [];
    const orchestrator = new NameserverOrchestrator(source, {
      dryRun: true,
      logger: createLogger(0, (line) => lines.push(line)),
    });

    await orchestrator.run({ view: 'default', nameservers: [nameserver()] });

    expect(lines).toEqual([]);
  });
});

describe('discoverGroups', () => {
  it('returns the groups listing the host as a secondary', () => {
    expect(
      discoverGroups('ns1.example.org', [
        { name: 'a', secondaries: ['ns1.example.org', 'ns2.example.org'] },
        { name: 'b', secondaries: ['ns2.example.org'] },
        { name: 'c', secondaries: ['ns1.example.org'] },
      ])
    ).toEqual(['a', 'c']);
  });
});
