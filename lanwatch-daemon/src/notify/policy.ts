/**
 * NotificationPolicy - maps a device event to a push payload.
 *
 * Joined/left notifications carry the device's configured priority. The startup
 * report always goes out at `active`, whatever the per-device settings say.
 */

import type { DeviceRegistry } from '../devices/registry.js';
import type { DeviceEvent, NotificationPayload, NotificationPriority } from '../devices/types.js';

export const STARTUP_REPORT_PRIORITY: NotificationPriority = 'active';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `YYYY-MM-DD HH:mm:ss` in server local time */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class NotificationPolicy {
  constructor(
    private readonly registry: DeviceRegistry,
    private readonly now: () => Date = () => new Date(),
  ) {}

  build(event: DeviceEvent): NotificationPayload {
    switch (event.type) {
      case 'joined':
        return {
          title: 'Device connected',
          body: `${this.describe(event.address)} joined the network`,
          priority: this.registry.priorityOf(event.address),
        };

      case 'left':
        return {
          title: 'Device disconnected',
          body: `${this.describe(event.address)} left the network`,
          priority: this.registry.priorityOf(event.address),
        };

      case 'startup_summary': {
        const lines = [...event.addresses].sort().map((mac) => this.describe(mac));
        return {
          title: 'Monitor startup report',
          body: [
            'lanwatch started',
            '',
            `Online devices (${lines.length}):`,
            ...lines,
            '',
            `Scanned at: ${formatTimestamp(this.now())}`,
          ].join('\n'),
          priority: STARTUP_REPORT_PRIORITY,
        };
      }
    }
  }

  private describe(mac: string): string {
    return `${this.registry.labelOf(mac)} (${mac})`;
  }
}
