// ── IPv4 helpers ──

const OCTET = /^(?:0|[1-9]\d{0,2})$/;

/**
 * Parse a strict dotted-quad IPv4 address.
 * Returns the canonical string, or null for anything else (leading zeros,
 * signs, surrounding text, out-of-range octets).
 */
export function parseIPv4(text: string): string | null {
  const parts = text.split('.');
  if (parts.length !== 4) return null;
  const octets: number[] = [];
  for (const p of parts) {
    if (!OCTET.test(p)) return null;
    const n = Number(p);
    if (n > 255) return null;
    octets.push(n);
  }
  return octets.join('.');
}

export function isIPv4(text: string): boolean {
  return parseIPv4(text) !== null;
}
