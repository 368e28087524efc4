import { BlockList, isIP } from 'node:net';
import { lookup } from 'node:dns/promises';
import { AllowlistDeniedError, ValidationError, type DenyReason } from '../errors.js';
import { msg } from '../lib/error-messages.js';

export type AllowlistDecision =
  | { allowed: true; url: string }
  | { allowed: false; reason: DenyReason; host: string };

export type HostResolver = (hostname: string) => Promise<string[]>;

export interface AllowlistOptions {
  baseUrl?: string;
  defaultUrl?: string;
  entries: string[];
  resolveHost?: HostResolver;
}

const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

const PRIVATE_V4: Array<[string, number]> = [
  ['0.0.0.0', 8],
  ['10.0.0.0', 8],
  ['100.64.0.0', 10],
  ['127.0.0.0', 8],
  ['169.254.0.0', 16],
  ['172.16.0.0', 12],
  ['192.0.0.0', 24],
  ['192.168.0.0', 16],
  ['198.18.0.0', 15],
  ['224.0.0.0', 4],
  ['240.0.0.0', 4],
];

const PRIVATE_V6: Array<[string, number]> = [
  ['::', 128],
  ['::1', 128],
  ['64:ff9b:1::', 48],
  ['fc00::', 7],
  ['fe80::', 10],
  ['ff00::', 8],
];

const privateRanges = new BlockList();
for (const [net, prefix] of PRIVATE_V4) privateRanges.addSubnet(net, prefix, 'ipv4');
for (const [net, prefix] of PRIVATE_V6) privateRanges.addSubnet(net, prefix, 'ipv6');

export const dnsResolver: HostResolver = async (hostname) => {
  const records = await lookup(hostname, { all: true, verbatim: true });
  return records.map((r) => r.address);
};

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

/** `::ffff:7f00:1` and `::ffff:127.0.0.1` both become `127.0.0.1`. */
function unmapIPv4(address: string): string {
  const lower = address.toLowerCase();
  if (!lower.startsWith('::ffff:')) return address;
  const tail = lower.slice('::ffff:'.length);
  if (isIP(tail) === 4) return tail;
  const hextets = tail.split(':');
  if (hextets.length !== 2) return address;
  const [hi, lo] = hextets.map((h) => parseInt(h, 16));
  if ([hi, lo].some((n) => Number.isNaN(n) || n < 0 || n > 0xffff)) return address;
  return [hi >> 8, hi & 0xff, lo >> 8, lo & 0xff].join('.');
}

/** Eight 16-bit groups of a valid IPv6 address, dotted IPv4 tail included. */
function ipv6Groups(address: string): number[] | null {
  let text = address.toLowerCase().replace(/%.*$/, '');
  const lastColon = text.lastIndexOf(':');
  const tail = text.slice(lastColon + 1);
  if (isIP(tail) === 4) {
    const [a, b, c, d] = tail.split('.').map(Number);
    text = `${text.slice(0, lastColon + 1)}${((a << 8) | b).toString(16)}:${((c << 8) | d).toString(16)}`;
  }

  const halves = text.split('::');
  if (halves.length > 2) return null;
  const head = halves[0] ? halves[0].split(':') : [];
  const rest = halves.length === 2 && halves[1] ? halves[1].split(':') : [];
  const fill = 8 - head.length - rest.length;
  if (fill < 0 || (halves.length === 1 && fill !== 0)) return null;

  const groups = [...head, ...Array<string>(fill).fill('0'), ...rest].map((h) => (/^[0-9a-f]{1,4}$/.test(h) ? parseInt(h, 16) : NaN));
  return groups.some(Number.isNaN) ? null : groups;
}

/**
 * IPv4 address carried inside an IPv6 one: IPv4-mapped (`::ffff:0:0/96`),
 * NAT64 well-known prefix (`64:ff9b::/96`) and 6to4 (`2002::/16`).
 */
function embeddedIPv4(address: string): string | null {
  const g = ipv6Groups(address);
  if (!g) return null;

  const v4 = (hi: number, lo: number) => [hi >> 8, hi & 0xff, lo >> 8, lo & 0xff].join('.');
  const zeros = (from: number, to: number) => g.slice(from, to).every((n) => n === 0);

  if (zeros(0, 5) && g[5] === 0xffff) return v4(g[6], g[7]);
  if (g[0] === 0x64 && g[1] === 0xff9b && zeros(2, 6)) return v4(g[6], g[7]);
  if (g[0] === 0x2002) return v4(g[1], g[2]);
  return null;
}

export function isPrivateAddress(address: string): boolean {
  const ip = stripBrackets(address);
  const family = isIP(ip);
  if (family === 4) return privateRanges.check(ip, 'ipv4');
  if (family === 6) {
    const embedded = embeddedIPv4(ip);
    return embedded !== null ? privateRanges.check(embedded, 'ipv4') : privateRanges.check(ip, 'ipv6');
  }
  return false;
}

function isLocalHostname(hostname: string): boolean {
  const host = hostname.toLowerCase().replace(/\.$/, '');
  return host === 'localhost' || host.endsWith('.localhost');
}

interface ParsedEntries {
  hosts: Set<string>;
  suffixes: string[];
  addresses: BlockList;
  hasAddresses: boolean;
}

function normaliseEntry(raw: string): string {
  let entry = raw.trim().toLowerCase();
  if (entry.includes('://')) {
    try {
      entry = new URL(entry).hostname;
    } catch {
      return '';
    }
  }
  entry = stripBrackets(entry);
  // host:port, but leave bare IPv6 alone
  if (isIP(entry) === 0 && !entry.includes('/')) entry = entry.replace(/:\d+$/, '');
  return entry.replace(/\.$/, '');
}

function parseEntries(entries: string[]): ParsedEntries {
  const parsed: ParsedEntries = { hosts: new Set(), suffixes: [], addresses: new BlockList(), hasAddresses: false };
  for (const raw of entries) {
    const entry = normaliseEntry(raw);
    if (!entry) continue;

    const slash = entry.indexOf('/');
    if (slash > 0) {
      const net = entry.slice(0, slash);
      const prefix = Number(entry.slice(slash + 1));
      const family = isIP(net);
      if (family !== 0 && Number.isInteger(prefix)) {
        parsed.addresses.addSubnet(net, prefix, family === 4 ? 'ipv4' : 'ipv6');
        parsed.hasAddresses = true;
      }
      continue;
    }

    const family = isIP(entry);
    if (family !== 0) {
      parsed.addresses.addAddress(entry, family === 4 ? 'ipv4' : 'ipv6');
      parsed.hasAddresses = true;
    } else if (entry.startsWith('*.')) {
      parsed.suffixes.push(entry.slice(1));
    } else {
      parsed.hosts.add(entry);
    }
  }
  return parsed;
}

/**
 * Decides whether an upstream endpoint may be contacted.
 *
 * Relative designators resolve against the configured base URL. Absolute
 * ones need an allowlist entry for their host. Whatever the route, a
 * destination that is loopback, link-local or private is refused, and no
 * allowlist entry lifts that.
 */
export class AllowlistValidator {
  private readonly base?: URL;
  private readonly entries: ParsedEntries;
  private readonly configured: boolean;

  constructor(private readonly options: AllowlistOptions) {
    if (options.baseUrl) {
      try {
        this.base = new URL(options.baseUrl);
      } catch {
        throw new ValidationError('INVALID_ENDPOINT', `Invalid UPSTREAM_BASE_URL: ${options.baseUrl}`);
      }
    }
    this.entries = parseEntries(options.entries);
    this.configured = this.entries.hosts.size > 0 || this.entries.suffixes.length > 0 || this.entries.hasAddresses;
  }

  /** Permit/deny decision. Malformed designators throw a ValidationError. */
  async check(designator: string): Promise<AllowlistDecision> {
    const { url, relative } = this.parse(designator);
    const host = stripBrackets(url.hostname);

    if (!relative) {
      if (!this.configured) {
        return { allowed: false, reason: 'NO_ALLOWLIST_CONFIGURED', host };
      }
      if (!this.matches(host)) {
        return { allowed: false, reason: 'NOT_ALLOWLISTED', host };
      }
    }

    if (await this.isPrivateDestination(host)) {
      return { allowed: false, reason: 'PRIVATE_ADDRESS_BLOCKED', host };
    }

    return { allowed: true, url: url.toString() };
  }

  /**
   * Resolves the endpoint of a submission, falling back to the default
   * upstream URL, and throws when it cannot be contacted.
   */
  async resolve(designator?: string): Promise<string> {
    const candidate = designator?.trim() || this.options.defaultUrl;
    if (!candidate) {
      throw new ValidationError('MISSING_ENDPOINT', msg('MISSING_ENDPOINT'));
    }

    const decision = await this.check(candidate);
    if (!decision.allowed) {
      throw new AllowlistDeniedError(decision.reason, decision.host);
    }
    return decision.url;
  }

  private parse(designator: string): { url: URL; relative: boolean } {
    const value = designator.trim();
    const hasScheme = SCHEME.test(value);
    let url: URL;

    if (hasScheme) {
      try {
        url = new URL(value);
      } catch {
        throw new ValidationError('INVALID_ENDPOINT', msg('INVALID_ENDPOINT'), { endpoint: value });
      }
    } else {
      if (!this.base) {
        throw new ValidationError('MISSING_ENDPOINT', msg('MISSING_BASE_URL'), { endpoint: value });
      }
      try {
        url = new URL(value, this.base);
      } catch {
        throw new ValidationError('INVALID_ENDPOINT', msg('INVALID_ENDPOINT'), { endpoint: value });
      }
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ValidationError('INVALID_ENDPOINT', msg('INVALID_ENDPOINT'), { endpoint: value });
    }

    // `//host/x` and `/\host/x` leave the base origin: not relative.
    const relative = !hasScheme && this.base !== undefined && url.origin === this.base.origin;
    return { url, relative };
  }

  private matches(host: string): boolean {
    const family = isIP(host);
    if (family !== 0) {
      const ip = unmapIPv4(host);
      return this.entries.addresses.check(ip, isIP(ip) === 4 ? 'ipv4' : 'ipv6');
    }
    const name = host.toLowerCase().replace(/\.$/, '');
    if (this.entries.hosts.has(name)) return true;
    return this.entries.suffixes.some((suffix) => name.endsWith(suffix));
  }

  private async isPrivateDestination(host: string): Promise<boolean> {
    if (isIP(host) !== 0) return isPrivateAddress(host);
    if (isLocalHostname(host)) return true;
    if (!this.options.resolveHost) return false;

    let addresses: string[];
    try {
      addresses = await this.options.resolveHost(host);
    } catch {
      // Unresolvable hosts fail later at connect time.
      return false;
    }
    return addresses.some(isPrivateAddress);
  }
}
