import { NodeSSH } from 'node-ssh';
import { config } from '../config.js';
import type { CommandRunner, ExecOutcome } from './exec.js';

/**
 * SSH command runner for scanning from another host (SCAN_HOST).
 *
 * Useful when the daemon itself cannot see the segment, e.g. it runs in a
 * container without host networking. Each runner keeps one persistent
 * connection to its host, opened lazily and replaced if it goes stale.
 */

/** Connect timeout in milliseconds */
const CONNECT_TIMEOUT = 10_000;

/** Single-quote an argument for the remote shell. */
export function shellQuote(arg: string): string {
  if (/^[A-Za-z0-9_./:=@-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export class SshRunner implements CommandRunner {
  private connection: NodeSSH | null = null;

  constructor(private readonly host: string) {}

  get target(): string {
    return `ssh://${config.sshUser}@${this.host}`;
  }

  async run(command: string, args: string[], timeoutMs: number): Promise<ExecOutcome> {
    let ssh: NodeSSH;
    try {
      ssh = await this.connect();
    } catch (err) {
      return { ok: false, reason: 'error', error: err instanceof Error ? err.message : String(err) };
    }

    const commandLine = [command, ...args].map(shellQuote).join(' ');
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      // ssh2 exec has no timeout of its own, so race it
      const timeoutPromise = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), timeoutMs);
      });
      const result = await Promise.race([ssh.execCommand(commandLine), timeoutPromise]);

      if (result === 'timeout') {
        // Stuck channel: drop the connection
        this.drop();
        return { ok: false, reason: 'timeout', error: `${command} timed out after ${timeoutMs}ms on ${this.host}` };
      }

      return { ok: true, result: { stdout: result.stdout, stderr: result.stderr, code: result.code } };
    } catch (err: unknown) {
      // Next call reconnects
      this.drop();
      return {
        ok: false,
        reason: 'error',
        error: `SSH exec on ${this.host} failed (${command}): ${err instanceof Error ? err.message : String(err)}`,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  /** Dispose the connection. Call on shutdown. */
  close(): void {
    try {
      this.drop();
    } catch (err) {
      console.warn(`[SSH] Dispose of ${this.host} failed:`, err instanceof Error ? err.message : err);
    }
  }

  private async connect(): Promise<NodeSSH> {
    if (this.connection?.isConnected()) {
      return this.connection;
    }
    this.drop();

    const ssh = new NodeSSH();
    try {
      await ssh.connect({
        host: this.host,
        username: config.sshUser,
        privateKeyPath: config.sshKeyPath,
        readyTimeout: CONNECT_TIMEOUT,
      });
    } catch (err: unknown) {
      ssh.dispose();
      throw new Error(`SSH connect to ${this.host} failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    this.connection = ssh;
    return ssh;
  }

  private drop(): void {
    const ssh = this.connection;
    this.connection = null;
    ssh?.dispose();
  }
}
