import type { AlertEvent, AlertSeverity } from '@hostpulse/shared';
import { postJson } from './NotificationChannel.js';
import type { NotificationChannel } from './NotificationChannel.js';

export interface SlackChannelOptions {
  webhookUrl: string;
  channel?: string;
  username?: string;
  timeout?: number;
}

/**
 * Slack Block Kit block types used for rich message formatting.
 */
interface SlackBlock {
  type: string;
  text?: { type: string; text: string; emoji?: boolean };
  fields?: { type: string; text: string }[];
  elements?: { type: string; text: string }[];
}

interface SlackAttachment {
  color: string;
  blocks: SlackBlock[];
  fallback: string;
}

export interface SlackPayload {
  channel?: string;
  username?: string;
  attachments: SlackAttachment[];
}

/**
 * Severity levels mapped to Slack sidebar colors.
 */
export const SEVERITY_COLORS: Record<AlertSeverity, string> = {
  info: '#36A64F',
  warning: '#FFA500',
  error: '#FF6600',
  critical: '#FF0000',
};

/**
 * Posts alerts to a Slack incoming webhook as a colored attachment.
 */
export class SlackChannel implements NotificationChannel {
  readonly name = 'slack' as const;
  private options: SlackChannelOptions;

  constructor(options: SlackChannelOptions) {
    this.options = options;
  }

  async send(event: AlertEvent): Promise<void> {
    await postJson(this.options.webhookUrl, this.formatMessage(event), {
      timeout: this.options.timeout,
    });
  }

  formatMessage(event: AlertEvent): SlackPayload {
    const title =
      event.kind === 'firing'
        ? `${event.severity.toUpperCase()}: ${event.key.metric} on ${event.key.hostname}`
        : `RECOVERED: ${event.key.metric} on ${event.key.hostname}`;

    const fields = [
      { label: 'Host', value: event.key.hostname },
      { label: 'Metric', value: event.key.subResource ?? event.key.metric },
      { label: 'Value', value: `${event.value}%` },
      { label: 'Threshold', value: `${event.threshold}%` },
    ];

    const blocks: SlackBlock[] = [
      {
        type: 'header',
        text: { type: 'plain_text', text: title, emoji: true },
      },
      {
        type: 'section',
        text: { type: 'mrkdwn', text: event.message },
      },
      {
        type: 'section',
        fields: fields.map((field) => ({
          type: 'mrkdwn',
          text: `*${field.label}:*\n${field.value}`,
        })),
      },
      {
        type: 'context',
        elements: [{ type: 'mrkdwn', text: `hostpulse | ${event.firedAt.toISOString()}` }],
      },
    ];

    const payload: SlackPayload = {
      attachments: [
        {
          color: SEVERITY_COLORS[event.severity],
          blocks,
          fallback: `${title}: ${event.message}`,
        },
      ],
    };

    if (this.options.username) payload.username = this.options.username;
    if (this.options.channel) payload.channel = this.options.channel;

    return payload;
  }
}
