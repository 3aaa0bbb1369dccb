/**
 * Command-line entry logic.
 *
 *   lanwatch                 startup report, then scan continuously
 *   lanwatch --once          single scan, no report
 *   lanwatch --init-report   single scan with startup report
 *   lanwatch --help          usage
 *
 * Returns a process exit code instead of exiting, so tests can drive it.
 */

import { config } from './config.js';
import { LocalRunner, type CommandRunner } from './clients/exec.js';
import { SshRunner } from './clients/ssh.js';
import { DeviceRegistry } from './devices/registry.js';
import { loadSettings, writeTemplate, type MonitorSettings } from './devices/settings.js';
import { runCycle, type MonitorDeps } from './monitor/cycle.js';
import { runForever } from './monitor/index.js';
import { BarkNotifier, type Notifier } from './notify/bark.js';
import { NotificationPolicy } from './notify/policy.js';
import { PresenceTracker } from './presence/tracker.js';
import { ArpScanner, type AddressSource } from './scanner/arp.js';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export type CliCommand =
  | { mode: 'loop' }
  | { mode: 'once' }
  | { mode: 'init-report' }
  | { mode: 'help' }
  | { mode: 'invalid'; arg: string };

export const USAGE = [
  'Usage:',
  '  lanwatch                 # continuous monitoring (sends a startup report first)',
  '  lanwatch --once          # single scan',
  '  lanwatch --init-report   # single scan and send the startup report',
  '  lanwatch --help          # show this help',
].join('\n');

/** Only the first argument is significant. */
export function parseCliArgs(argv: string[]): CliCommand {
  const arg: string | undefined = argv[0];
  switch (arg) {
    case undefined:
      return { mode: 'loop' };
    case '--once':
      return { mode: 'once' };
    case '--init-report':
      return { mode: 'init-report' };
    case '--help':
    case '-h':
      return { mode: 'help' };
    default:
      return { mode: 'invalid', arg };
  }
}

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

export interface CliOverrides {
  settingsPath?: string;
  source?: AddressSource;
  notifier?: Notifier;
  signal?: AbortSignal;
}

export function createRunner(): CommandRunner {
  return config.scanHost ? new SshRunner(config.scanHost) : new LocalRunner();
}

export function createMonitor(
  settings: MonitorSettings,
  overrides: CliOverrides = {},
  runner: CommandRunner = createRunner(),
): MonitorDeps {
  const registry = DeviceRegistry.fromSettings(settings);
  return {
    source: overrides.source ?? new ArpScanner(runner),
    registry,
    tracker: new PresenceTracker(),
    policy: new NotificationPolicy(registry),
    notifier: overrides.notifier ?? new BarkNotifier({ apiKey: settings.barkApiKey, baseUrl: settings.barkBaseUrl }),
    subnets: settings.scanSubnets,
    networkInterface: settings.networkInterface,
  };
}

/** Abort on SIGINT/SIGTERM; the current cycle still completes. */
function signalController(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => {
    console.log(`\n[${name}] Stopping after the current cycle...`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

export async function runCli(argv: string[], overrides: CliOverrides = {}): Promise<number> {
  const command = parseCliArgs(argv);

  if (command.mode === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (command.mode === 'invalid') {
    console.log(`Unknown argument: ${command.arg}`);
    console.log('Run with --help to list the available options');
    return 1;
  }

  const settingsPath = overrides.settingsPath ?? config.settingsPath;
  const loaded = await loadSettings(settingsPath);

  if (!loaded.ok) {
    if (loaded.kind === 'ConfigMissing') {
      console.log(`[Config] ${settingsPath} not found, writing an example...`);
      await writeTemplate(settingsPath);
      console.log(`[Config] Edit ${settingsPath} and run lanwatch again`);
    } else {
      console.error(`[Config] ${settingsPath} is invalid: ${loaded.error}`);
    }
    return 1;
  }

  const { settings } = loaded;
  const runner = createRunner();
  const deps = createMonitor(settings, overrides, runner);

  if (!settings.barkApiKey) {
    console.warn('[Config] bark_api_key is not set, notifications are disabled');
  }
  console.log(
    `[Config] Loaded ${settingsPath}: ${deps.registry.size} known devices, ` +
    `${deps.registry.ignoredCount} ignored, ${settings.scanSubnets.length} subnets`,
  );

  try {
    switch (command.mode) {
      case 'once':
        await runCycle(deps);
        return 0;

      case 'init-report':
        console.log('[Monitor] Running startup report');
        await runCycle(deps, { startupReport: true });
        return 0;
    }

    const signals = overrides.signal ? null : signalController();
    try {
      await runForever(deps, {
        intervalSeconds: settings.scanIntervalSeconds,
        startupReport: true,
        signal: overrides.signal ?? signals?.signal,
      });
    } finally {
      signals?.dispose();
    }
    return 0;
  } finally {
    runner.close?.();
  }
}
