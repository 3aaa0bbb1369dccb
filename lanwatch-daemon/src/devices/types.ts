/**
 * Device domain types shared by the registry, tracker and notifier.
 */

/** Uppercase, colon-delimited MAC address, e.g. `AA:BB:CC:DD:EE:FF`. */
export type HardwareAddress = string;

/** One sampling instant: every address seen, already filtered by the ignore list. */
export type ScanResult = ReadonlySet<HardwareAddress>;

export const NOTIFICATION_PRIORITIES = ['silent', 'normal', 'active', 'timeSensitive'] as const;

/**
 * Delivery urgency tier. `vibrate` in the monitor document is read as `active`.
 */
export type NotificationPriority = (typeof NOTIFICATION_PRIORITIES)[number];

export type DeviceEvent =
  | { type: 'joined'; address: HardwareAddress }
  | { type: 'left'; address: HardwareAddress }
  | { type: 'startup_summary'; addresses: HardwareAddress[] };

export interface NotificationPayload {
  title: string;
  body: string;
  priority: NotificationPriority;
}
