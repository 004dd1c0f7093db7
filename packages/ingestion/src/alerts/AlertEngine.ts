import { nanoid } from 'nanoid';
import { getLogger } from '@hostpulse/shared';
import type {
  AlertEvent,
  AlertKey,
  AlertPolicy,
  AlertState,
  AlertsConfig,
  Logger,
  MetricKey,
  MetricSnapshot,
  ThresholdRule,
  ThresholdsConfig,
} from '@hostpulse/shared';
import { alertKeyToString, evaluateObservation, extractObservations } from './stateMachine.js';
import type { AlertStateMap, AlertTransition, Observation } from './stateMachine.js';

const METRIC_KEYS: readonly MetricKey[] = ['cpu', 'memory', 'disk', 'swap'];
const MINUTE_MS = 60_000;

export function buildAlertPolicy(thresholds: ThresholdsConfig, alerts: AlertsConfig): AlertPolicy {
  const rules: Partial<Record<MetricKey, ThresholdRule>> = {};
  for (const metric of METRIC_KEYS) {
    const rule = thresholds[metric];
    rules[metric] = {
      threshold: rule.value,
      recoveryThreshold: rule.recovery ?? rule.value,
      cooldownMs: (rule.cooldown_minutes ?? alerts.cooldown_minutes) * MINUTE_MS,
    };
  }
  return { rules };
}

function describeKey(key: AlertKey): string {
  return key.subResource !== undefined ? `${key.metric} ${key.subResource}` : key.metric;
}

export function formatAlertMessage(key: AlertKey, transition: AlertTransition): string {
  const subject = `${describeKey(key)} on ${key.hostname}`;
  if (transition.kind === 'firing') {
    return `${subject} at ${transition.value}% (threshold ${transition.threshold}%)`;
  }
  return `${subject} recovered at ${transition.value}% (below ${transition.threshold}%)`;
}

export interface AlertEngineOptions {
  policy: AlertPolicy;
  logger?: Logger;
  idFactory?: () => string;
}

/**
 * Owns the per-key alert state. `evaluate` is synchronous, so concurrent
 * ingests never interleave a key's read-modify-write.
 */
export class AlertEngine {
  private policy: AlertPolicy;
  private states: AlertStateMap = new Map();
  private logger: Logger;
  private idFactory: () => string;

  constructor(options: AlertEngineOptions) {
    this.policy = options.policy;
    this.logger = options.logger ?? getLogger().child({ component: 'alert-engine' });
    this.idFactory = options.idFactory ?? (() => nanoid());
  }

  /** Evaluate every observation in the snapshot at the snapshot's timestamp. */
  evaluate(snapshot: MetricSnapshot): AlertEvent[] {
    const events: AlertEvent[] = [];

    for (const observation of extractObservations(snapshot, this.policy.rules)) {
      const rule = this.policy.rules[observation.key.metric];
      if (!rule) continue;

      const transitions = evaluateObservation(this.states, observation, rule, snapshot.timestamp);
      for (const transition of transitions) {
        events.push(this.toEvent(observation, transition, snapshot.timestamp));
      }
    }

    return events;
  }

  getState(key: AlertKey): Readonly<AlertState> | undefined {
    return this.states.get(alertKeyToString(key));
  }

  getStates(): ReadonlyMap<string, Readonly<AlertState>> {
    return this.states;
  }

  /** Drop `normal` states last observed before `before`. Returns how many were removed. */
  evictIdle(before: Date): number {
    let evicted = 0;
    for (const [id, state] of this.states) {
      if (state.phase === 'normal' && state.lastObservedAt.getTime() < before.getTime()) {
        this.states.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) {
      this.logger.debug({ evicted, remaining: this.states.size }, 'Evicted idle alert states');
    }
    return evicted;
  }

  private toEvent(observation: Observation, transition: AlertTransition, at: Date): AlertEvent {
    const { key } = observation;
    const event: AlertEvent = Object.freeze({
      id: this.idFactory(),
      key: Object.freeze({ ...key }),
      kind: transition.kind,
      severity: transition.severity,
      value: transition.value,
      threshold: transition.threshold,
      firedAt: at,
      message: formatAlertMessage(key, transition),
    });

    const context = {
      alertId: event.id,
      hostname: key.hostname,
      metric: key.metric,
      subResource: key.subResource,
      value: event.value,
      threshold: event.threshold,
      severity: event.severity,
    };
    if (event.kind === 'firing') {
      this.logger.warn(context, 'Alert fired');
    } else {
      this.logger.info(context, 'Alert recovered');
    }

    return event;
  }
}
