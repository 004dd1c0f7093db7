import { getLogger } from '@hostpulse/shared';
import type { AlertEvent, AlertSeverity, Logger } from '@hostpulse/shared';
import type { NotificationChannel } from './NotificationChannel.js';

const LEVELS: Record<AlertSeverity, 'info' | 'warn' | 'error'> = {
  info: 'info',
  warning: 'warn',
  error: 'error',
  critical: 'error',
};

export class LogChannel implements NotificationChannel {
  readonly name = 'log' as const;
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getLogger().child({ component: 'alerts', channel: 'log' });
  }

  async send(event: AlertEvent): Promise<void> {
    this.logger[LEVELS[event.severity]](
      {
        alertId: event.id,
        kind: event.kind,
        severity: event.severity,
        hostname: event.key.hostname,
        metric: event.key.metric,
        subResource: event.key.subResource,
        value: event.value,
        threshold: event.threshold,
        firedAt: event.firedAt.toISOString(),
      },
      event.message,
    );
  }
}
