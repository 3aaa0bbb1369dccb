/**
 * One scan -> diff -> notify -> commit cycle.
 *
 * The tracker state is committed only after every event of the cycle has been
 * built and handed to the notifier. Delivery failures are recorded in the
 * report but never block the commit: delivery is best-effort.
 */

import { debugLog } from '../config.js';
import type { DeviceRegistry } from '../devices/registry.js';
import type { DeviceEvent, HardwareAddress, NotificationPayload } from '../devices/types.js';
import type { Notifier, DeliveryOutcome } from '../notify/bark.js';
import type { NotificationPolicy } from '../notify/policy.js';
import type { PresenceTracker } from '../presence/tracker.js';
import type { AddressSource, ScanFailure } from '../scanner/arp.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MonitorDeps {
  source: AddressSource;
  registry: DeviceRegistry;
  tracker: PresenceTracker;
  policy: NotificationPolicy;
  notifier: Notifier;
  subnets: string[];
  networkInterface: string;
}

export interface CycleOptions {
  startupReport?: boolean;
}

export interface CycleReport {
  online: HardwareAddress[];
  joined: HardwareAddress[];
  left: HardwareAddress[];
  isFirstObservation: boolean;
  events: DeviceEvent[];
  deliveries: DeliveryOutcome[];
  scanFailures: ScanFailure[];
}

// ---------------------------------------------------------------------------
// Cycle
// ---------------------------------------------------------------------------

/** Notifiers report failures as outcomes; a rejection is folded into one too. */
async function deliver(notifier: Notifier, payload: NotificationPayload): Promise<DeliveryOutcome> {
  try {
    return await notifier.send(payload);
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    console.error(`[Monitor] Notifier error for "${payload.title}": ${error}`);
    return { status: 'failed', kind: 'DeliveryFailure', error };
  }
}

export async function runCycle(deps: MonitorDeps, options: CycleOptions = {}): Promise<CycleReport> {
  const { source, registry, tracker, policy, notifier } = deps;

  console.log('[Monitor] Scanning...');
  const outcome = await source.scan(deps.subnets, deps.networkInterface);
  const scan = registry.filter(outcome.addresses);
  console.log(
    `[Monitor] Scan complete via ${outcome.method}: ${scan.size} devices ` +
    `(${outcome.addresses.size - scan.size} ignored)`,
  );

  const delta = tracker.diff(scan);
  const events = tracker.events(delta, scan, { startupReport: options.startupReport });
  const online = [...scan].sort();

  if (delta.isFirstObservation) {
    console.log(`[Presence] First scan: ${scan.size} devices online`);
    for (const mac of online) {
      console.log(`[Presence]   - ${registry.labelOf(mac)} (${mac})`);
    }
  } else if (delta.joined.length > 0 || delta.left.length > 0) {
    console.log(`[Presence] Changes: +${delta.joined.length} -${delta.left.length}`);
  } else {
    debugLog('[Presence] No changes');
  }

  const deliveries: DeliveryOutcome[] = [];
  for (const event of events) {
    const payload = policy.build(event);
    switch (event.type) {
      case 'joined':
        console.log(`[Presence] Joined: ${registry.labelOf(event.address)} (${event.address})`);
        break;
      case 'left':
        console.log(`[Presence] Left: ${registry.labelOf(event.address)} (${event.address})`);
        break;
      case 'startup_summary':
        console.log(`[Presence] Sending startup report (${event.addresses.length} devices)`);
        break;
    }
    deliveries.push(await deliver(notifier, payload));
  }

  tracker.commit(scan);
  console.log(`[Monitor] Online devices: ${scan.size}`);

  return {
    online,
    joined: delta.joined,
    left: delta.left,
    isFirstObservation: delta.isFirstObservation,
    events,
    deliveries,
    scanFailures: outcome.failures,
  };
}
