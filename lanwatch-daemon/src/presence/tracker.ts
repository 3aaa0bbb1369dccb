/**
 * PresenceTracker - owns the previous scan and turns each new scan into
 * joined/left events.
 *
 * While the committed scan is empty there is nothing to diff against: the scan
 * only establishes the baseline, unless a startup report is requested and the
 * scan found something, in which case it yields a single startup_summary
 * listing every address. An empty scan never becomes a baseline that the next
 * scan would be diffed against. State is replaced by commit() only, so a cycle
 * that fails before commit leaves the previous scan intact.
 *
 * There is no debouncing: a device that drops out for one scan is reported as
 * left, then joined again on the next cycle.
 */

import type { DeviceEvent, HardwareAddress, ScanResult } from '../devices/types.js';
import type { EventOptions, PresenceDelta } from './types.js';

function difference(a: ScanResult, b: ScanResult): HardwareAddress[] {
  const out: HardwareAddress[] = [];
  for (const mac of a) {
    if (!b.has(mac)) out.push(mac);
  }
  return out.sort();
}

export class PresenceTracker {
  private previousScan: Set<HardwareAddress> = new Set();

  /** Compare a scan against the committed state. Does not mutate anything. */
  diff(scan: ScanResult): PresenceDelta {
    if (this.previousScan.size === 0) {
      return { joined: [], left: [], isFirstObservation: true };
    }
    return {
      joined: difference(scan, this.previousScan),
      left: difference(this.previousScan, scan),
      isFirstObservation: false,
    };
  }

  /** Events for a delta, in dispatch order: joined first, then left. */
  events(delta: PresenceDelta, scan: ScanResult, options: EventOptions = {}): DeviceEvent[] {
    if (delta.isFirstObservation) {
      return options.startupReport && scan.size > 0
        ? [{ type: 'startup_summary', addresses: [...scan].sort() }]
        : [];
    }
    return [
      ...delta.joined.map((address): DeviceEvent => ({ type: 'joined', address })),
      ...delta.left.map((address): DeviceEvent => ({ type: 'left', address })),
    ];
  }

  /** Replace the committed state with `scan`. */
  commit(scan: ScanResult): void {
    this.previousScan = new Set(scan);
  }

  get previous(): ScanResult {
    return this.previousScan;
  }
}
