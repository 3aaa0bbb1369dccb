/**
 * Bark push delivery.
 *
 * Uses the Bark v2 GET form: `<base>/<key>/<title>/<body>?level=...`.
 * Delivery is best-effort: failures come back as an outcome and are logged,
 * they never throw into the scan loop. Without an API key nothing is sent.
 */

import { config } from '../config.js';
import type { NotificationPayload, NotificationPriority } from '../devices/types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DeliveryOutcome =
  | { status: 'delivered' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; kind: 'DeliveryFailure'; error: string };

export interface Notifier {
  send(payload: NotificationPayload): Promise<DeliveryOutcome>;
}

export interface BarkOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

// ---------------------------------------------------------------------------
// Priority -> Bark query parameters
// ---------------------------------------------------------------------------

/**
 * `normal` sends no parameters so Bark uses its default sound.
 * `silent` is passive and muted; `active` and `timeSensitive` map to the
 * Bark level of the same name.
 */
export function barkParams(priority: NotificationPriority): Record<string, string> {
  switch (priority) {
    case 'silent':
      return { sound: 'silent', level: 'passive' };
    case 'active':
      return { level: 'active' };
    case 'timeSensitive':
      return { level: 'timeSensitive' };
    case 'normal':
      return {};
  }
}

export function buildBarkUrl(baseUrl: string, apiKey: string, payload: NotificationPayload): string {
  const base = baseUrl.replace(/\/+$/, '');
  const url = new URL(
    `${base}/${encodeURIComponent(apiKey)}/${encodeURIComponent(payload.title)}/${encodeURIComponent(payload.body)}`,
  );
  for (const [key, value] of Object.entries(barkParams(payload.priority))) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

// ---------------------------------------------------------------------------
// Notifier
// ---------------------------------------------------------------------------

export class BarkNotifier implements Notifier {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: BarkOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? config.notifyTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get enabled(): boolean {
    return this.apiKey.length > 0;
  }

  async send(payload: NotificationPayload): Promise<DeliveryOutcome> {
    if (!this.enabled) {
      console.log(`[Bark] No API key configured, skipping "${payload.title}"`);
      return { status: 'skipped', reason: 'bark_api_key not configured' };
    }

    try {
      const response = await this.fetchImpl(buildBarkUrl(this.baseUrl, this.apiKey, payload), {
        method: 'GET',
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.status !== 200) {
        const text = await response.text().catch(() => '');
        const error = `HTTP ${response.status}${text ? ` - ${text.slice(0, 200)}` : ''}`;
        console.warn(`[Bark] Delivery failed for "${payload.title}": ${error}`);
        return { status: 'failed', kind: 'DeliveryFailure', error };
      }

      console.log(`[Bark] Delivered "${payload.title}" (${payload.priority})`);
      return { status: 'delivered' };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      console.error(`[Bark] Send failed for "${payload.title}": ${error}`);
      return { status: 'failed', kind: 'DeliveryFailure', error };
    }
  }
}
