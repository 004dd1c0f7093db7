export type MetricKey = 'cpu' | 'memory' | 'disk' | 'swap';

export type AlertSeverity = 'info' | 'warning' | 'error' | 'critical';

export type ChannelName = 'log' | 'slack' | 'email' | 'webhook';

/** Identity of one alertable condition. */
export interface AlertKey {
  readonly hostname: string;
  readonly metric: MetricKey;
  readonly subResource?: string;
}

/**
 * `firing` is transient: a key that fires moves straight into `cooldown`,
 * so only `normal` and `cooldown` are ever stored.
 */
export type AlertPhase = 'normal' | 'firing' | 'cooldown';

export interface AlertState {
  phase: Exclude<AlertPhase, 'firing'>;
  lastFiredAt: Date | null;
  isActive: boolean;
  lastValue: number;
  lastObservedAt: Date;
}

export interface AlertEvent {
  readonly id: string;
  readonly key: AlertKey;
  readonly kind: 'firing' | 'recovered';
  readonly severity: AlertSeverity;
  readonly value: number;
  readonly threshold: number;
  readonly firedAt: Date;
  readonly message: string;
}

export interface ThresholdRule {
  threshold: number;
  recoveryThreshold: number;
  cooldownMs: number;
}

export interface AlertPolicy {
  rules: Partial<Record<MetricKey, ThresholdRule>>;
}
