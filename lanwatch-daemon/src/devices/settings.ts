/**
 * Monitor document: the JSON file an operator edits to name devices, pick the
 * subnets to scan and configure Bark delivery.
 *
 * Keys keep their snake_case names on disk and are mapped to a typed
 * MonitorSettings struct. Every MAC address is normalized on load, so the rest
 * of the daemon can compare addresses with plain string equality.
 */

import fs from 'node:fs/promises';
import net from 'node:net';
import { z } from 'zod';
import { normalizeMac } from './mac.js';
import type { HardwareAddress, NotificationPriority } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MonitorSettings {
  /** Empty string disables delivery (scanning and logging still run) */
  barkApiKey: string;
  barkBaseUrl: string;
  networkInterface: string;
  scanSubnets: string[];
  scanIntervalSeconds: number;
  deviceLabels: Map<HardwareAddress, string>;
  ignoredDevices: Set<HardwareAddress>;
  devicePriorities: Map<HardwareAddress, NotificationPriority>;
}

export type SettingsLoadResult =
  | { ok: true; settings: MonitorSettings }
  | { ok: false; kind: 'ConfigMissing' | 'ConfigMalformed'; error: string };

export const DEFAULT_BARK_BASE_URL = 'https://api.day.app';

/** Key written by writeTemplate(); treated as "not configured". */
export const PLACEHOLDER_API_KEY = 'your_bark_api_key_here';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

function canonicalPriority(level: NotificationPriority | 'vibrate'): NotificationPriority {
  return level === 'vibrate' ? 'active' : level;
}

function isCidr(value: string): boolean {
  const [address, prefix, ...rest] = value.split('/');
  if (rest.length > 0 || prefix === undefined || !/^\d{1,2}$/.test(prefix)) return false;
  return net.isIPv4(address) && parseInt(prefix, 10) <= 32;
}

function normalizeKeys<V>(entries: Record<string, V>, ctx: z.RefinementCtx): Map<HardwareAddress, V> {
  const out = new Map<HardwareAddress, V>();
  const spelling = new Map<HardwareAddress, string>();
  for (const [raw, value] of Object.entries(entries)) {
    const mac = normalizeMac(raw);
    if (!mac) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid MAC address "${raw}"`, path: [raw] });
      continue;
    }
    const first = spelling.get(mac);
    if (first !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate MAC address "${raw}" (same device as "${first}")`,
        path: [raw],
      });
      continue;
    }
    spelling.set(mac, raw);
    out.set(mac, value);
  }
  return out;
}

const macSchema = z.string().transform((raw, ctx) => {
  const mac = normalizeMac(raw);
  if (!mac) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid MAC address "${raw}"` });
    return z.NEVER;
  }
  return mac;
});

const prioritySchema = z
  .enum(['silent', 'normal', 'vibrate', 'active', 'timeSensitive'])
  .transform(canonicalPriority);

const settingsSchema = z.object({
  bark_api_key: z.string().default(''),
  bark_base_url: z.string().url().default(DEFAULT_BARK_BASE_URL),
  network_interface: z.string().min(1).default('eth0'),
  scan_subnets: z
    .array(z.string().refine(isCidr, { message: 'expected an IPv4 CIDR such as 192.168.1.0/24' }))
    .min(1)
    .default(['192.168.1.0/24']),
  scan_interval: z.number().positive().default(60),
  device_mapping: z.record(z.string(), z.string().min(1)).default({}).transform(normalizeKeys),
  ignore_devices: z.array(macSchema).default([]),
  notification_settings: z.record(z.string(), prioritySchema).default({}).transform(normalizeKeys),
});

type RawSettings = z.output<typeof settingsSchema>;

function toSettings(raw: RawSettings): MonitorSettings {
  return {
    barkApiKey: raw.bark_api_key === PLACEHOLDER_API_KEY ? '' : raw.bark_api_key.trim(),
    barkBaseUrl: raw.bark_base_url,
    networkInterface: raw.network_interface,
    scanSubnets: raw.scan_subnets,
    scanIntervalSeconds: raw.scan_interval,
    deviceLabels: raw.device_mapping,
    ignoredDevices: new Set(raw.ignore_devices),
    devicePriorities: raw.notification_settings,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Validate an already-parsed document. */
export function parseSettings(document: unknown): SettingsLoadResult {
  const parsed = settingsSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, kind: 'ConfigMalformed', error: formatIssues(parsed.error) };
  }
  return { ok: true, settings: toSettings(parsed.data) };
}

/**
 * Read and validate the monitor document at `filePath`.
 * Never throws: a missing file and a malformed file are both reported in the result.
 */
export async function loadSettings(filePath: string): Promise<SettingsLoadResult> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { ok: false, kind: 'ConfigMissing', error: `${filePath} does not exist` };
    }
    return {
      ok: false,
      kind: 'ConfigMalformed',
      error: `cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    return {
      ok: false,
      kind: 'ConfigMalformed',
      error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  return parseSettings(document);
}

export const SETTINGS_TEMPLATE = {
  bark_api_key: PLACEHOLDER_API_KEY,
  bark_base_url: DEFAULT_BARK_BASE_URL,
  network_interface: 'eth0',
  scan_subnets: ['192.168.1.0/24'],
  scan_interval: 60,
  device_mapping: {
    'AA:BB:CC:DD:EE:FF': 'iPhone 12',
    '11:22:33:44:55:66': 'MacBook Pro',
  },
  ignore_devices: ['FF:FF:FF:FF:FF:FF'],
  notification_settings: {
    'AA:BB:CC:DD:EE:FF': 'vibrate',
    '11:22:33:44:55:66': 'silent',
  },
};

/** Write the example document for the operator to edit. */
export async function writeTemplate(filePath: string): Promise<void> {
  await fs.writeFile(filePath, `${JSON.stringify(SETTINGS_TEMPLATE, null, 2)}\n`, 'utf-8');
}
