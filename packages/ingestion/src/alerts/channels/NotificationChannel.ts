import { DEFAULT_CHANNEL_TIMEOUT } from '@hostpulse/shared';
import type { AlertEvent, ChannelName } from '@hostpulse/shared';

/**
 * One notification sink. `send` rejects on failure; retries and error
 * isolation belong to the dispatcher.
 */
export interface NotificationChannel {
  readonly name: ChannelName;
  send(event: AlertEvent): Promise<void>;
}

/** JSON shape of an alert event as channels serialize it. */
export interface SerializedAlertEvent {
  id: string;
  kind: AlertEvent['kind'];
  severity: AlertEvent['severity'];
  hostname: string;
  metric: string;
  sub_resource?: string;
  value: number;
  threshold: number;
  fired_at: string;
  message: string;
}

export function serializeAlertEvent(event: AlertEvent): SerializedAlertEvent {
  return {
    id: event.id,
    kind: event.kind,
    severity: event.severity,
    hostname: event.key.hostname,
    metric: event.key.metric,
    ...(event.key.subResource !== undefined ? { sub_resource: event.key.subResource } : {}),
    value: event.value,
    threshold: event.threshold,
    fired_at: event.firedAt.toISOString(),
    message: event.message,
  };
}

/** POST `body` as JSON and reject on transport failure or a non-2xx status. */
export async function postJson(
  url: string,
  body: unknown,
  options: { headers?: Record<string, string>; timeout?: number } = {},
): Promise<void> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...options.headers },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(options.timeout ?? DEFAULT_CHANNEL_TIMEOUT),
  });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Responded ${response.status}: ${text}`);
  }
}
