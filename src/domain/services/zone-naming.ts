import { isIP } from 'net';
import type { ZoneRecord } from '../entities/zone.entity.js';
import { NamingError } from '../errors.js';

/**
 * Domain name used in config directives and data file names for a zone.
 *
 * Forward zones keep their name. Reverse zones are stored as networks in CIDR
 * notation and map to their `in-addr.arpa` / `ip6.arpa` name. IPv4 networks that
 * do not end on an octet boundary use the RFC 2317 classless form
 * (`192.0.2.128/25` → `128/25.2.0.192.in-addr.arpa`).
 */
export function canonicalDomain(record: ZoneRecord): string {
  switch (record.kind) {
    case 'forward':
      return stripRootDot(record.name);
    case 'ipv4':
      return stripRootDot(reverseIpv4Network(record.name));
    case 'ipv6':
      return stripRootDot(reverseIpv6Network(record.name));
    default:
      throw new NamingError(record.name, `unsupported zone format "${record.kind}"`);
  }
}

/**
 * Data file name for a zone: the first `/` becomes `_`.
 */
export function zoneFileName(domain: string): string {
  return domain.replace('/', '_');
}

function stripRootDot(name: string): string {
  return name.endsWith('.') ? name.slice(0, -1) : name;
}

function splitCidr(network: string): { address: string; prefix: number } | { error: string } {
  const parts = network.trim().split('/');
  if (parts.length !== 2) {
    return { error: 'expected network in address/prefix notation' };
  }

  const [address, prefixText] = parts;
  if (!/^\d{1,3}$/.test(prefixText)) {
    return { error: `invalid prefix length "${prefixText}"` };
  }

  return { address, prefix: Number.parseInt(prefixText, 10) };
}

export function reverseIpv4Network(network: string): string {
  const parsed = splitCidr(network);
  if ('error' in parsed) {
    throw new NamingError(network, parsed.error);
  }

  const { address, prefix } = parsed;
  if (isIP(address) !== 4) {
    throw new NamingError(network, `not a valid IPv4 address: ${address}`);
  }
  if (prefix < 1 || prefix > 32) {
    throw new NamingError(network, `IPv4 prefix length must be between 1 and 32, got ${prefix}`);
  }

  const octets = address.split('.');
  const fullOctets = Math.floor(prefix / 8);
  const labels = octets.slice(0, fullOctets).reverse();

  // RFC 2317 delegation label for the partial octet
  if (prefix % 8 !== 0) {
    labels.unshift(`${octets[fullOctets]}/${prefix}`);
  }

  return [...labels, 'in-addr', 'arpa'].join('.');
}

export function reverseIpv6Network(network: string): string {
  const parsed = splitCidr(network);
  if ('error' in parsed) {
    throw new NamingError(network, parsed.error);
  }

  const { address, prefix } = parsed;
  if (isIP(address) !== 6) {
    throw new NamingError(network, `not a valid IPv6 address: ${address}`);
  }
  if (prefix < 4 || prefix > 128 || prefix % 4 !== 0) {
    throw new NamingError(
      network,
      `IPv6 prefix length must be a multiple of 4 between 4 and 128, got ${prefix}`
    );
  }

  const nibbles = expandIpv6ToNibbles(address);
  if (!nibbles) {
    throw new NamingError(network, `not a valid IPv6 address: ${address}`);
  }

  const labels = nibbles.slice(0, prefix / 4).reverse();
  return [...labels, 'ip6', 'arpa'].join('.');
}

/**
 * Expand an IPv6 address into its 32 lowercase hex nibbles.
 */
export function expandIpv6ToNibbles(ip: string): string[] | null {
  const [withoutZone] = ip.split('%');

  if (!withoutZone.includes(':') || withoutZone.split('::').length > 2) {
    return null;
  }

  const [head, tail] = withoutZone.split('::');
  const headParts = head ? head.split(':').filter(Boolean) : [];
  const tailParts = tail ? tail.split(':').filter(Boolean) : [];

  // Embedded IPv4 tail (::ffff:192.0.2.1)
  const extraNibbles: string[] = [];
  const last = tailParts.length > 0 ? tailParts[tailParts.length - 1] : headParts[headParts.length - 1];
  if (last?.includes('.')) {
    (tailParts.length > 0 ? tailParts : headParts).pop();
    const bytes = last.split('.').map((o) => Number.parseInt(o, 10));
    if (bytes.length !== 4 || bytes.some((b) => Number.isNaN(b) || b < 0 || b > 255)) {
      return null;
    }
    for (const b of bytes) {
      extraNibbles.push(...b.toString(16).padStart(2, '0'));
    }
  }

  const toNibbles = (parts: string[]): string[] | null => {
    const out: string[] = [];
    for (const part of parts) {
      if (!/^[0-9a-fA-F]{1,4}$/.test(part)) {
        return null;
      }
      out.push(...part.toLowerCase().padStart(4, '0'));
    }
    return out;
  };

  const headNibbles = toNibbles(headParts);
  const tailNibbles = toNibbles(tailParts);
  if (!headNibbles || !tailNibbles) {
    return null;
  }

  const known = headNibbles.length + tailNibbles.length + extraNibbles.length;
  if (known > 32 || (tail === undefined && known !== 32)) {
    return null;
  }

  const zeros = Array.from({ length: 32 - known }, () => '0');
  return [...headNibbles, ...zeros, ...tailNibbles, ...extraNibbles];
}
