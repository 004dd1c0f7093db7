import { getLogger } from '@hostpulse/shared';
import type { AlertEvent, Logger } from '@hostpulse/shared';
import { postJson } from './NotificationChannel.js';
import type { NotificationChannel } from './NotificationChannel.js';

export interface EmailChannelOptions {
  /** Mail relay that accepts the JSON payload. Without one the payload is only logged. */
  endpoint?: string;
  from: string;
  to: string[];
  subjectPrefix: string;
  timeout?: number;
  logger?: Logger;
}

export interface EmailPayload {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Email notifications without an SMTP dependency: the prepared message is
 * POSTed to a REST mail relay, or logged for an external system to pick up.
 */
export class EmailChannel implements NotificationChannel {
  readonly name = 'email' as const;
  private options: EmailChannelOptions;
  private logger: Logger;

  constructor(options: EmailChannelOptions) {
    this.options = options;
    this.logger = options.logger ?? getLogger().child({ component: 'alerts', channel: 'email' });
  }

  async send(event: AlertEvent): Promise<void> {
    const payload = this.buildPayload(event);

    if (!this.options.endpoint) {
      this.logger.info({ email: payload }, 'Email alert prepared (no relay endpoint configured)');
      return;
    }

    await postJson(this.options.endpoint, payload, { timeout: this.options.timeout });
    this.logger.debug({ alertId: event.id, to: payload.to }, 'Email alert sent');
  }

  buildPayload(event: AlertEvent): EmailPayload {
    const label = event.kind === 'firing' ? event.severity.toUpperCase() : 'RECOVERED';
    const subject = `${this.options.subjectPrefix} [${label}] ${event.message}`;

    const rows: Array<[string, string]> = [
      ['Host', event.key.hostname],
      ['Metric', event.key.subResource ? `${event.key.metric} (${event.key.subResource})` : event.key.metric],
      ['Value', `${event.value}%`],
      ['Threshold', `${event.threshold}%`],
      ['Time', event.firedAt.toISOString()],
    ];

    const text = [event.message, '', ...rows.map(([name, value]) => `${name}: ${value}`)].join('\n');
    const html = [
      `<h2>${escapeHtml(event.message)}</h2>`,
      '<table>',
      ...rows.map(
        ([name, value]) => `<tr><th align="left">${name}</th><td>${escapeHtml(value)}</td></tr>`,
      ),
      '</table>',
    ].join('\n');

    return { from: this.options.from, to: [...this.options.to], subject, text, html };
  }
}
