/**
 * Address and name helpers shared by configuration and preflight checks
 */

const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

// RFC 1123 labels, at least two of them, TLD alphabetic
const DOMAIN_PATTERN = /^(?=.{1,253}$)(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/i;

export interface ParsedCidr {
  network: number;
  prefix: number;
}

/**
 * Parse an IPv4 CIDR block; returns undefined when the text is not one
 */
export function parseCidr(cidr: string): ParsedCidr | undefined {
  const match = CIDR_PATTERN.exec(cidr.trim());
  if (!match) {
    return undefined;
  }

  const octets = match.slice(1, 5).map(Number);
  const prefix = Number(match[5]);
  if (octets.some((octet) => octet > 255) || prefix > 32) {
    return undefined;
  }

  const address = octets.reduce((acc, octet) => acc * 256 + octet, 0);
  const size = 2 ** (32 - prefix);
  return { network: address - (address % size), prefix };
}

export function isValidCidr(cidr: string): boolean {
  return parseCidr(cidr) !== undefined;
}

/**
 * Whether two CIDR blocks share at least one address
 */
export function cidrsOverlap(a: string, b: string): boolean {
  const left = parseCidr(a);
  const right = parseCidr(b);
  if (!left || !right) {
    return false;
  }

  const leftEnd = left.network + 2 ** (32 - left.prefix);
  const rightEnd = right.network + 2 ** (32 - right.prefix);
  return left.network < rightEnd && right.network < leftEnd;
}

export function isValidDomain(domain: string): boolean {
  return DOMAIN_PATTERN.test(domain);
}
