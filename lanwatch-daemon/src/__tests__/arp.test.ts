/**
 * Unit tests for the ARP scanner.
 * Commands go through a scripted CommandRunner; nothing is executed.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../config.js', () => ({
  config: { arpScanTimeoutMs: 30000, arpTableTimeoutMs: 10000 },
  debugLog: vi.fn(),
}));

import { ArpScanner, parseArpScanOutput } from '../scanner/arp.js';
import type { CommandRunner, ExecOutcome } from '../clients/exec.js';

type Handler = (command: string, args: string[]) => ExecOutcome;

class ScriptedRunner implements CommandRunner {
  readonly target = 'test';
  readonly calls: Array<{ command: string; args: string[]; timeoutMs: number }> = [];

  constructor(private readonly handler: Handler) {}

  async run(command: string, args: string[], timeoutMs: number): Promise<ExecOutcome> {
    this.calls.push({ command, args, timeoutMs });
    return this.handler(command, args);
  }
}

function exited(stdout: string, code = 0, stderr = ''): ExecOutcome {
  return { ok: true, result: { stdout, stderr, code } };
}

const ARP_SCAN_OUTPUT = [
  'Interface: eth0, type: EN10MB, MAC: 02:42:ac:11:00:02, IPv4: 192.168.1.10',
  'Starting arp-scan 1.10.0 with 256 hosts',
  '192.168.1.1\taa:bb:cc:dd:ee:01\tRouter Vendor',
  '192.168.1.20\t11-22-33-44-55-66\t(Unknown)',
  '',
  '2 packets received by filter, 0 packets dropped by kernel',
  'Ending arp-scan 1.10.0: 256 hosts scanned in 1.912 seconds. 2 responded',
].join('\n');

const ARP_TABLE_OUTPUT = [
  '? (192.168.1.1) at aa:bb:cc:dd:ee:01 [ether] on eth0',
  '? (192.168.1.7) at <incomplete> on eth0',
].join('\n');

describe('parseArpScanOutput', () => {
  it('reads host lines and skips the interface banner', () => {
    expect(parseArpScanOutput(ARP_SCAN_OUTPUT)).toEqual(['AA:BB:CC:DD:EE:01', '11:22:33:44:55:66']);
  });
});

describe('ArpScanner', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('scans each subnet with arp-scan on the configured interface', async () => {
    const runner = new ScriptedRunner(() => exited(ARP_SCAN_OUTPUT));
    const outcome = await new ArpScanner(runner).scan(['192.168.1.0/24', '192.168.2.0/24'], 'eth1');

    expect(runner.calls).toEqual([
      { command: 'arp-scan', args: ['192.168.1.0/24', '--interface', 'eth1'], timeoutMs: 30000 },
      { command: 'arp-scan', args: ['192.168.2.0/24', '--interface', 'eth1'], timeoutMs: 30000 },
    ]);
    expect(outcome.method).toBe('arp-scan');
    expect([...outcome.addresses]).toEqual(['AA:BB:CC:DD:EE:01', '11:22:33:44:55:66']);
    expect(outcome.failures).toEqual([]);
  });

  it('keeps results from other subnets when one subnet times out', async () => {
    const runner = new ScriptedRunner((_command, args) =>
      args[0] === '10.0.0.0/24'
        ? { ok: false, reason: 'timeout', error: 'arp-scan timed out after 30000ms' }
        : exited('192.168.1.30\t66:77:88:99:aa:bb\tVendor'),
    );
    const outcome = await new ArpScanner(runner).scan(['10.0.0.0/24', '192.168.1.0/24'], 'eth0');

    expect([...outcome.addresses]).toEqual(['66:77:88:99:AA:BB']);
    expect(outcome.method).toBe('arp-scan');
    expect(outcome.failures).toEqual([
      { kind: 'ScanTimeout', scope: '10.0.0.0/24', error: 'arp-scan timed out after 30000ms' },
    ]);
  });

  it('records a non-zero exit as a subnet failure', async () => {
    const runner = new ScriptedRunner((command, args) => {
      if (command === 'arp') return exited('');
      return args[0] === '10.0.0.0/24' ? exited('', 1, 'pcap_activate: permission denied') : exited('');
    });
    const outcome = await new ArpScanner(runner).scan(['10.0.0.0/24'], 'eth0');

    expect(outcome.failures[0]).toEqual({
      kind: 'ScanSubnetFailure',
      scope: '10.0.0.0/24',
      error: 'pcap_activate: permission denied',
    });
  });

  it('falls back to the ARP table when arp-scan is missing', async () => {
    const runner = new ScriptedRunner((command) =>
      command === 'arp-scan'
        ? { ok: false, reason: 'not_found', error: 'arp-scan: command not found' }
        : exited(ARP_TABLE_OUTPUT),
    );
    const outcome = await new ArpScanner(runner).scan(['192.168.1.0/24', '192.168.2.0/24'], 'eth0');

    // Stops after the first subnet, then reads the table once
    expect(runner.calls.map((c) => c.command)).toEqual(['arp-scan', 'arp']);
    expect(runner.calls[1]).toEqual({ command: 'arp', args: ['-a'], timeoutMs: 10000 });
    expect(outcome.method).toBe('arp-table');
    expect([...outcome.addresses]).toEqual(['AA:BB:CC:DD:EE:01']);
    expect(outcome.failures.map((f) => f.kind)).toEqual(['ScanToolUnavailable']);
  });

  it('treats exit status 127 from a remote shell as a missing tool', async () => {
    const runner = new ScriptedRunner((command) =>
      command === 'arp-scan' ? exited('', 127, 'sh: arp-scan: not found') : exited(ARP_TABLE_OUTPUT),
    );
    const outcome = await new ArpScanner(runner).scan(['192.168.1.0/24'], 'eth0');

    expect(outcome.failures).toEqual([
      { kind: 'ScanToolUnavailable', scope: '192.168.1.0/24', error: 'sh: arp-scan: not found' },
    ]);
    expect(outcome.method).toBe('arp-table');
  });

  it('warns about reduced coverage when the fallback serves several subnets', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const runner = new ScriptedRunner((command) =>
      command === 'arp-scan' ? { ok: false, reason: 'not_found', error: 'missing' } : exited(ARP_TABLE_OUTPUT),
    );
    await new ArpScanner(runner).scan(['192.168.1.0/24', '192.168.2.0/24'], 'eth0');

    expect(warn).toHaveBeenCalledWith(
      '[Scanner] ARP table only covers the local segment; 2 subnets are configured. Install arp-scan for full coverage.',
    );
  });

  it('returns an empty result when every method fails', async () => {
    const runner = new ScriptedRunner(() => ({ ok: false, reason: 'not_found', error: 'missing' }));
    const outcome = await new ArpScanner(runner).scan(['192.168.1.0/24'], 'eth0');

    expect(outcome.addresses.size).toBe(0);
    expect(outcome.failures).toEqual([
      { kind: 'ScanToolUnavailable', scope: '192.168.1.0/24', error: 'missing' },
      { kind: 'ScanToolUnavailable', scope: 'arp-table', error: 'missing' },
    ]);
  });

  it('honours custom timeouts', async () => {
    const runner = new ScriptedRunner(() => exited(ARP_SCAN_OUTPUT));
    await new ArpScanner(runner, { arpScanTimeoutMs: 500 }).scan(['192.168.1.0/24'], 'eth0');
    expect(runner.calls[0].timeoutMs).toBe(500);
  });
});
