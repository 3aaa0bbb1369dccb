/**
 * ARP address source.
 *
 * Primary method: `arp-scan <subnet> --interface <iface>`, one subnet at a
 * time. A subnet that fails or times out contributes nothing; the remaining
 * subnets still run. If arp-scan is not installed the primary loop stops.
 *
 * Fallback: when the primary method found no address at all, read the
 * system neighbour table with `arp -a`. That only covers the directly
 * attached segment, so with several subnets configured the result is partial.
 *
 * Nothing here throws; every failure ends up in ScanOutcome.failures.
 */

import { config, debugLog } from '../config.js';
import { extractMacs, normalizeMac } from '../devices/mac.js';
import type { HardwareAddress } from '../devices/types.js';
import { EXIT_COMMAND_NOT_FOUND, type CommandRunner } from '../clients/exec.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ScanFailureKind = 'ScanSubnetFailure' | 'ScanToolUnavailable' | 'ScanTimeout';

export interface ScanFailure {
  kind: ScanFailureKind;
  /** Subnet the failure belongs to, or 'arp-table' for the fallback */
  scope: string;
  error: string;
}

export interface ScanOutcome {
  addresses: Set<HardwareAddress>;
  method: 'arp-scan' | 'arp-table';
  failures: ScanFailure[];
}

export interface AddressSource {
  scan(subnets: string[], iface: string): Promise<ScanOutcome>;
}

export interface ArpScannerOptions {
  arpScanTimeoutMs?: number;
  arpTableTimeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Output parsing
// ---------------------------------------------------------------------------

const ARP_SCAN_HOST_LINE = /^\d{1,3}(?:\.\d{1,3}){3}\s+(\S+)/;

/**
 * Addresses from arp-scan output. Only host lines (`<ip>\t<mac>\t<vendor>`)
 * count; the "Interface: ..., MAC: ..." banner carries the scanning host's own
 * address and is skipped.
 */
export function parseArpScanOutput(stdout: string): HardwareAddress[] {
  const macs: HardwareAddress[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const match = line.match(ARP_SCAN_HOST_LINE);
    if (!match) continue;
    const mac = normalizeMac(match[1]);
    if (mac) macs.push(mac);
  }
  return macs;
}

// ---------------------------------------------------------------------------
// Scanner
// ---------------------------------------------------------------------------

export class ArpScanner implements AddressSource {
  private readonly arpScanTimeoutMs: number;
  private readonly arpTableTimeoutMs: number;

  constructor(
    private readonly runner: CommandRunner,
    options: ArpScannerOptions = {},
  ) {
    this.arpScanTimeoutMs = options.arpScanTimeoutMs ?? config.arpScanTimeoutMs;
    this.arpTableTimeoutMs = options.arpTableTimeoutMs ?? config.arpTableTimeoutMs;
  }

  async scan(subnets: string[], iface: string): Promise<ScanOutcome> {
    const addresses = new Set<HardwareAddress>();
    const failures: ScanFailure[] = [];

    for (const subnet of subnets) {
      const failure = await this.scanSubnet(subnet, iface, addresses);
      if (!failure) continue;

      failures.push(failure);
      if (failure.kind === 'ScanToolUnavailable') {
        console.warn('[Scanner] arp-scan is not installed, switching to the ARP table');
        break;
      }
      if (failure.kind === 'ScanTimeout') {
        console.error(`[Scanner] Subnet ${subnet} timed out`);
      } else {
        console.warn(`[Scanner] Subnet ${subnet} scan failed: ${failure.error}`);
      }
    }

    if (addresses.size > 0) {
      return { addresses, method: 'arp-scan', failures };
    }

    console.log('[Scanner] Using ARP table fallback');
    const fallbackFailure = await this.readArpTable(addresses);
    if (fallbackFailure) {
      failures.push(fallbackFailure);
      console.error(`[Scanner] ARP table fallback failed: ${fallbackFailure.error}`);
    } else if (subnets.length > 1) {
      console.warn(
        `[Scanner] ARP table only covers the local segment; ${subnets.length} subnets are configured. ` +
        'Install arp-scan for full coverage.',
      );
    }

    return { addresses, method: 'arp-table', failures };
  }

  private async scanSubnet(
    subnet: string,
    iface: string,
    addresses: Set<HardwareAddress>,
  ): Promise<ScanFailure | null> {
    debugLog(`[Scanner] Scanning ${subnet} on ${iface} via ${this.runner.target}`);
    const outcome = await this.runner.run('arp-scan', [subnet, '--interface', iface], this.arpScanTimeoutMs);

    if (!outcome.ok) {
      return {
        kind: outcome.reason === 'not_found'
          ? 'ScanToolUnavailable'
          : outcome.reason === 'timeout' ? 'ScanTimeout' : 'ScanSubnetFailure',
        scope: subnet,
        error: outcome.error,
      };
    }

    const { code, stdout, stderr } = outcome.result;
    if (code === EXIT_COMMAND_NOT_FOUND) {
      return { kind: 'ScanToolUnavailable', scope: subnet, error: stderr.trim() || 'arp-scan: command not found' };
    }
    if (code !== 0) {
      return { kind: 'ScanSubnetFailure', scope: subnet, error: stderr.trim() || `arp-scan exited with ${code}` };
    }

    const found = parseArpScanOutput(stdout);
    for (const mac of found) addresses.add(mac);
    debugLog(`[Scanner] Subnet ${subnet}: ${found.length} addresses`);
    return null;
  }

  private async readArpTable(addresses: Set<HardwareAddress>): Promise<ScanFailure | null> {
    const outcome = await this.runner.run('arp', ['-a'], this.arpTableTimeoutMs);

    if (!outcome.ok) {
      return {
        kind: outcome.reason === 'timeout' ? 'ScanTimeout' : 'ScanToolUnavailable',
        scope: 'arp-table',
        error: outcome.error,
      };
    }
    if (outcome.result.code !== 0) {
      return {
        kind: 'ScanSubnetFailure',
        scope: 'arp-table',
        error: outcome.result.stderr.trim() || `arp exited with ${outcome.result.code}`,
      };
    }

    for (const mac of extractMacs(outcome.result.stdout)) addresses.add(mac);
    debugLog(`[Scanner] ARP table: ${addresses.size} addresses`);
    return null;
  }
}
