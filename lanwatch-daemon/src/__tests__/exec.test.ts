/**
 * Tests for the command runners.
 * LocalRunner spawns the current Node binary; node-ssh is mocked for SshRunner.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const ssh = vi.hoisted(() => ({
  connect: vi.fn(),
  execCommand: vi.fn(),
  dispose: vi.fn(),
  isConnected: vi.fn(() => true),
}));

vi.mock('node-ssh', () => ({
  NodeSSH: class {
    connect = ssh.connect;
    execCommand = ssh.execCommand;
    dispose = ssh.dispose;
    isConnected = ssh.isConnected;
  },
}));

vi.mock('../config.js', () => ({
  config: { sshUser: 'scanner', sshKeyPath: '/tmp/id_test' },
  debugLog: vi.fn(),
}));

import { LocalRunner } from '../clients/exec.js';
import { SshRunner, shellQuote } from '../clients/ssh.js';

describe('LocalRunner', () => {
  const runner = new LocalRunner();

  it('reports a missing binary as not_found', async () => {
    await expect(runner.run('lanwatch-no-such-binary', [], 1000)).resolves.toEqual({
      ok: false,
      reason: 'not_found',
      error: 'lanwatch-no-such-binary: command not found',
    });
  });

  it('reports a killed command as timeout', async () => {
    await expect(runner.run(process.execPath, ['-e', 'setTimeout(() => {}, 5000)'], 50)).resolves.toEqual({
      ok: false,
      reason: 'timeout',
      error: `${process.execPath} timed out after 50ms`,
    });
  });

  it('returns a non-zero exit as a completed run with its code', async () => {
    await expect(runner.run(process.execPath, ['-e', 'process.exit(3)'], 5000)).resolves.toEqual({
      ok: true,
      result: { stdout: '', stderr: '', code: 3 },
    });
  });

  it('captures stdout of a successful run', async () => {
    await expect(runner.run(process.execPath, ['-e', 'process.stdout.write("hi")'], 5000)).resolves.toEqual({
      ok: true,
      result: { stdout: 'hi', stderr: '', code: 0 },
    });
  });
});

describe('shellQuote', () => {
  it('leaves plain arguments alone and quotes the rest', () => {
    expect(shellQuote('192.168.1.0/24')).toBe('192.168.1.0/24');
    expect(shellQuote("it's here")).toBe(`'it'\\''s here'`);
  });
});

describe('SshRunner', () => {
  beforeEach(() => {
    ssh.connect.mockReset().mockResolvedValue(undefined);
    ssh.execCommand.mockReset();
    ssh.dispose.mockReset();
    ssh.isConnected.mockReset().mockReturnValue(true);
  });

  it('runs the quoted command line on the host', async () => {
    ssh.execCommand.mockResolvedValue({ stdout: 'out', stderr: '', code: 0 });
    const runner = new SshRunner('scan-host');

    await expect(runner.run('arp-scan', ['192.168.1.0/24', '--interface', 'eth0'], 1000)).resolves.toEqual({
      ok: true,
      result: { stdout: 'out', stderr: '', code: 0 },
    });
    expect(ssh.execCommand).toHaveBeenCalledWith('arp-scan 192.168.1.0/24 --interface eth0');
    expect(ssh.connect).toHaveBeenCalledWith(expect.objectContaining({ host: 'scan-host', username: 'scanner' }));
    expect(runner.target).toBe('ssh://scanner@scan-host');
  });

  it('reuses the connection across runs', async () => {
    ssh.execCommand.mockResolvedValue({ stdout: '', stderr: '', code: 0 });
    const runner = new SshRunner('scan-host');

    await runner.run('arp', ['-a'], 1000);
    await runner.run('arp', ['-a'], 1000);

    expect(ssh.connect).toHaveBeenCalledTimes(1);
  });

  it('times out a command that never finishes, drops the connection and reconnects', async () => {
    ssh.execCommand.mockImplementationOnce(() => new Promise(() => {}));
    ssh.execCommand.mockResolvedValueOnce({ stdout: '', stderr: '', code: 0 });
    const runner = new SshRunner('scan-host');

    await expect(runner.run('arp-scan', ['192.168.1.0/24'], 20)).resolves.toEqual({
      ok: false,
      reason: 'timeout',
      error: 'arp-scan timed out after 20ms on scan-host',
    });
    expect(ssh.dispose).toHaveBeenCalledTimes(1);

    await expect(runner.run('arp', ['-a'], 1000)).resolves.toMatchObject({ ok: true });
    expect(ssh.connect).toHaveBeenCalledTimes(2);
  });

  it('reports a failed connect as an error outcome', async () => {
    ssh.connect.mockRejectedValue(new Error('connection refused'));
    const runner = new SshRunner('scan-host');

    await expect(runner.run('arp', ['-a'], 1000)).resolves.toEqual({
      ok: false,
      reason: 'error',
      error: 'SSH connect to scan-host failed: connection refused',
    });
    expect(ssh.execCommand).not.toHaveBeenCalled();
  });

  it('disposes the connection on close', async () => {
    ssh.execCommand.mockResolvedValue({ stdout: '', stderr: '', code: 0 });
    const runner = new SshRunner('scan-host');
    await runner.run('arp', ['-a'], 1000);

    runner.close();
    expect(ssh.dispose).toHaveBeenCalledTimes(1);
  });
});
