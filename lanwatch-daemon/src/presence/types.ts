/**
 * Presence tracking types.
 */

import type { HardwareAddress } from '../devices/types.js';

export interface PresenceDelta {
  joined: HardwareAddress[];      // in this scan, not in the previous one (sorted)
  left: HardwareAddress[];        // in the previous scan, not in this one (sorted)
  isFirstObservation: boolean;    // committed scan is empty
}

export interface EventOptions {
  /** Emit a startup_summary on first observation instead of staying silent */
  startupReport?: boolean;
}
