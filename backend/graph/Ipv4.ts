export type Ipv4Range = {
  /** Network address with host bits cleared, as an unsigned 32-bit integer. */
  readonly network: number;
  readonly prefixLength: number;
};

const OCTET = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/;

/** Parses dotted-quad notation; returns null for anything else. */
export const parseIpv4 = (text: string): number | null => {
  const parts = text.trim().split('.');
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!OCTET.test(part)) return null;
    value = value * 256 + Number(part);
  }
  return value;
};

const maskFor = (prefixLength: number): number =>
  prefixLength === 0 ? 0 : (0xffffffff << (32 - prefixLength)) >>> 0;

export const parseCidr = (base: string, prefixLength: number): Ipv4Range | null => {
  const address = parseIpv4(base);
  if (address === null) return null;
  if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > 32) return null;

  return {
    network: (address & maskFor(prefixLength)) >>> 0,
    prefixLength,
  };
};

export const cidrContains = (range: Ipv4Range, address: number): boolean =>
  ((address & maskFor(range.prefixLength)) >>> 0) === range.network;

export const formatCidr = (base: string, prefixLength: number): string => `${base}/${prefixLength}`;
