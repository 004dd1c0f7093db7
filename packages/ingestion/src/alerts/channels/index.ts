import { ConfigValidationError, getLogger } from '@hostpulse/shared';
import type { AlertsConfig, ChannelName, Logger } from '@hostpulse/shared';
import type { NotificationChannel } from './NotificationChannel.js';
import { LogChannel } from './LogChannel.js';
import { SlackChannel } from './SlackChannel.js';
import { EmailChannel } from './EmailChannel.js';
import { WebhookChannel } from './WebhookChannel.js';

export type { NotificationChannel, SerializedAlertEvent } from './NotificationChannel.js';
export { postJson, serializeAlertEvent } from './NotificationChannel.js';
export { LogChannel } from './LogChannel.js';
export { SlackChannel, SEVERITY_COLORS } from './SlackChannel.js';
export type { SlackChannelOptions, SlackPayload } from './SlackChannel.js';
export { EmailChannel } from './EmailChannel.js';
export type { EmailChannelOptions, EmailPayload } from './EmailChannel.js';
export { WebhookChannel } from './WebhookChannel.js';
export type { WebhookChannelOptions } from './WebhookChannel.js';

function missing(channel: ChannelName): ConfigValidationError {
  return new ConfigValidationError([
    `alerts.${channel}: the "${channel}" channel is enabled but not configured`,
  ]);
}

/** Build the enabled channels in configured order. */
export function createChannels(alerts: AlertsConfig, logger?: Logger): NotificationChannel[] {
  const base = logger ?? getLogger().child({ component: 'alerts' });

  return alerts.channels.map((name): NotificationChannel => {
    switch (name) {
      case 'log':
        return new LogChannel(base.child({ channel: 'log' }));
      case 'slack': {
        if (!alerts.slack) throw missing(name);
        return new SlackChannel({
          webhookUrl: alerts.slack.webhook_url,
          channel: alerts.slack.channel,
          username: alerts.slack.username,
        });
      }
      case 'email': {
        if (!alerts.email) throw missing(name);
        return new EmailChannel({
          endpoint: alerts.email.endpoint,
          from: alerts.email.from,
          to: alerts.email.to,
          subjectPrefix: alerts.email.subject_prefix,
          logger: base.child({ channel: 'email' }),
        });
      }
      case 'webhook': {
        if (!alerts.webhook) throw missing(name);
        return new WebhookChannel({ url: alerts.webhook.url, headers: alerts.webhook.headers });
      }
    }
  });
}
