import type { HardwareAddress } from './types.js';

const MAC_EXACT = /^([0-9a-f]{2})[:-]([0-9a-f]{2})[:-]([0-9a-f]{2})[:-]([0-9a-f]{2})[:-]([0-9a-f]{2})[:-]([0-9a-f]{2})$/i;
const MAC_IN_TEXT = /([0-9a-f]{2}[:-]){5}[0-9a-f]{2}/i;

/**
 * Normalize a MAC address to uppercase colon-delimited form.
 * Returns null for anything that is not six hex octet pairs.
 */
export function normalizeMac(raw: string): HardwareAddress | null {
  const match = raw.trim().match(MAC_EXACT);
  if (!match) return null;
  return match.slice(1).join(':').toUpperCase();
}

/**
 * Pull MAC addresses out of arp-scan / `arp -a` output.
 * First match per line, in order of appearance.
 */
export function extractMacs(text: string): HardwareAddress[] {
  const macs: HardwareAddress[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = line.match(MAC_IN_TEXT);
    if (!match) continue;
    const mac = normalizeMac(match[0]);
    if (mac) macs.push(mac);
  }
  return macs;
}
