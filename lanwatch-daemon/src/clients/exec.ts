import { execFile } from 'node:child_process';

/**
 * Command execution for the scanner.
 *
 * Scan tools run either on this host (LocalRunner) or on a remote host over
 * SSH (see ssh.ts). Both report the same outcome shape so the scanner does not
 * care where arp-scan actually ran.
 */

// -------------------------------------------------------------------- Types

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number | null;
}

/**
 * A non-zero exit is still `ok: true`; the caller decides what a failing
 * exit code means. `ok: false` is reserved for "the command never completed".
 */
export type ExecOutcome =
  | { ok: true; result: ExecResult }
  | { ok: false; reason: 'not_found' | 'timeout' | 'error'; error: string };

export interface CommandRunner {
  run(command: string, args: string[], timeoutMs: number): Promise<ExecOutcome>;
  /** Human-readable location for log lines */
  readonly target: string;
  /** Release held connections, if any */
  close?(): void;
}

/** Exit status a POSIX shell returns for an unknown command */
export const EXIT_COMMAND_NOT_FOUND = 127;

const MAX_BUFFER = 4 * 1024 * 1024;

// -------------------------------------------------------------------- Local

export class LocalRunner implements CommandRunner {
  readonly target = 'localhost';

  run(command: string, args: string[], timeoutMs: number): Promise<ExecOutcome> {
    return new Promise((resolve) => {
      execFile(
        command,
        args,
        { timeout: timeoutMs, maxBuffer: MAX_BUFFER, encoding: 'utf8' },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ ok: true, result: { stdout, stderr, code: 0 } });
            return;
          }

          const code: unknown = error.code;
          if (code === 'ENOENT') {
            resolve({ ok: false, reason: 'not_found', error: `${command}: command not found` });
          } else if (error.killed) {
            resolve({ ok: false, reason: 'timeout', error: `${command} timed out after ${timeoutMs}ms` });
          } else if (typeof code === 'number') {
            resolve({ ok: true, result: { stdout, stderr, code } });
          } else {
            resolve({ ok: false, reason: 'error', error: error.message });
          }
        },
      );
    });
  }
}
