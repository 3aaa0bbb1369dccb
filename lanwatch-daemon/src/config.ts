import 'dotenv/config';
import os from 'node:os';
import path from 'node:path';

export const config = {
  // Monitor document (device labels, subnets, Bark key)
  settingsPath: process.env.LANWATCH_CONFIG || './config.json',
  debug: process.env.LANWATCH_DEBUG === 'true',

  // Scan command timeouts
  arpScanTimeoutMs: parseInt(process.env.ARP_SCAN_TIMEOUT_MS || '30000', 10),
  arpTableTimeoutMs: parseInt(process.env.ARP_TABLE_TIMEOUT_MS || '10000', 10),

  // Push delivery
  notifyTimeoutMs: parseInt(process.env.NOTIFY_TIMEOUT_MS || '10000', 10),

  // Optional remote scan host (empty = run arp-scan locally)
  scanHost: process.env.SCAN_HOST || '',
  sshUser: process.env.SSH_USER || 'root',
  sshKeyPath: process.env.SSH_KEY_PATH || path.join(os.homedir(), '.ssh', 'id_ed25519'),
} as const;

/** Print a line only when LANWATCH_DEBUG=true. */
export function debugLog(message: string): void {
  if (config.debug) {
    console.log(message);
  }
}
