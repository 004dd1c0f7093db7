import type { AlertEvent } from '@hostpulse/shared';
import { postJson, serializeAlertEvent } from './NotificationChannel.js';
import type { NotificationChannel } from './NotificationChannel.js';

export interface WebhookChannelOptions {
  url: string;
  headers?: Record<string, string>;
  timeout?: number;
}

export class WebhookChannel implements NotificationChannel {
  readonly name = 'webhook' as const;
  private options: WebhookChannelOptions;

  constructor(options: WebhookChannelOptions) {
    this.options = options;
  }

  async send(event: AlertEvent): Promise<void> {
    await postJson(this.options.url, serializeAlertEvent(event), {
      headers: this.options.headers,
      timeout: this.options.timeout,
    });
  }
}
