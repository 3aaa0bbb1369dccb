/**
 * DeviceRegistry - static MAC -> label/priority lookup plus the ignore list.
 *
 * Built once from the monitor document at startup and never mutated; restart
 * the daemon to pick up edits.
 */

import type { MonitorSettings } from './settings.js';
import type { HardwareAddress, NotificationPriority, ScanResult } from './types.js';

export const DEFAULT_PRIORITY: NotificationPriority = 'normal';

export class DeviceRegistry {
  private readonly labels: ReadonlyMap<HardwareAddress, string>;
  private readonly priorities: ReadonlyMap<HardwareAddress, NotificationPriority>;
  private readonly ignored: ReadonlySet<HardwareAddress>;

  constructor(
    labels: ReadonlyMap<HardwareAddress, string> = new Map(),
    ignored: Iterable<HardwareAddress> = [],
    priorities: ReadonlyMap<HardwareAddress, NotificationPriority> = new Map(),
  ) {
    this.labels = new Map(labels);
    this.ignored = new Set(ignored);
    this.priorities = new Map(priorities);
  }

  static fromSettings(settings: MonitorSettings): DeviceRegistry {
    return new DeviceRegistry(settings.deviceLabels, settings.ignoredDevices, settings.devicePriorities);
  }

  labelOf(mac: HardwareAddress): string {
    return this.labels.get(mac) ?? `Unknown device (${mac})`;
  }

  priorityOf(mac: HardwareAddress): NotificationPriority {
    return this.priorities.get(mac) ?? DEFAULT_PRIORITY;
  }

  isIgnored(mac: HardwareAddress): boolean {
    return this.ignored.has(mac);
  }

  /** Drop ignored addresses. Runs before the tracker sees a scan. */
  filter(addresses: Iterable<HardwareAddress>): ScanResult {
    const result = new Set<HardwareAddress>();
    for (const mac of addresses) {
      if (!this.ignored.has(mac)) result.add(mac);
    }
    return result;
  }

  /** Number of devices with a configured label */
  get size(): number {
    return this.labels.size;
  }

  get ignoredCount(): number {
    return this.ignored.size;
  }
}
