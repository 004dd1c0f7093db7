import type {
  AlertKey,
  AlertSeverity,
  AlertState,
  MetricKey,
  MetricSnapshot,
  ThresholdRule,
} from '@hostpulse/shared';

export interface Observation {
  key: AlertKey;
  value: number;
}

export interface AlertTransition {
  kind: 'firing' | 'recovered';
  severity: AlertSeverity;
  value: number;
  threshold: number;
}

export type AlertStateMap = Map<string, AlertState>;

export function alertKeyToString(key: AlertKey): string {
  return key.subResource !== undefined
    ? `${key.hostname}|${key.metric}|${key.subResource}`
    : `${key.hostname}|${key.metric}`;
}

/**
 * Scale how far `value` overshoots `threshold` against the remaining
 * headroom to 100%.
 */
export function computeSeverity(value: number, threshold: number): AlertSeverity {
  if (threshold >= 100) return 'critical';
  const ratio = (value - threshold) / (100 - threshold);
  if (ratio < 0.5) return 'warning';
  if (ratio < 0.75) return 'error';
  return 'critical';
}

/** Pull every alertable value out of a snapshot for the metrics that have a rule. */
export function extractObservations(
  snapshot: MetricSnapshot,
  rules: Partial<Record<MetricKey, ThresholdRule>>,
): Observation[] {
  const { hostname } = snapshot;
  const observations: Observation[] = [];

  if (rules.cpu) {
    observations.push({ key: { hostname, metric: 'cpu' }, value: snapshot.cpu.overall_percent });
  }
  if (rules.memory) {
    observations.push({ key: { hostname, metric: 'memory' }, value: snapshot.memory.percent_used });
  }
  if (rules.swap && snapshot.swap) {
    observations.push({ key: { hostname, metric: 'swap' }, value: snapshot.swap.percent_used });
  }
  if (rules.disk) {
    for (const fs of snapshot.disk.filesystems) {
      observations.push({
        key: { hostname, metric: 'disk', subResource: fs.mount_point },
        value: fs.percent_used,
      });
    }
  }

  return observations;
}

function firing(value: number, rule: ThresholdRule): AlertTransition {
  return {
    kind: 'firing',
    severity: computeSeverity(value, rule.threshold),
    value,
    threshold: rule.threshold,
  };
}

function recovered(value: number, rule: ThresholdRule): AlertTransition {
  return { kind: 'recovered', severity: 'info', value, threshold: rule.recoveryThreshold };
}

/**
 * Apply one observation at time `at` to the state of its key and return the
 * transitions it caused, in order. Mutates `states`; callers must not
 * interleave evaluations of the same key.
 */
export function evaluateObservation(
  states: AlertStateMap,
  observation: Observation,
  rule: ThresholdRule,
  at: Date,
): AlertTransition[] {
  const id = alertKeyToString(observation.key);
  const { value } = observation;
  const state = states.get(id);

  // Replayed or out-of-order snapshot
  if (state && at.getTime() <= state.lastObservedAt.getTime()) return [];

  if (!state || state.phase === 'normal') {
    if (value >= rule.threshold) {
      states.set(id, {
        phase: 'cooldown',
        lastFiredAt: at,
        isActive: true,
        lastValue: value,
        lastObservedAt: at,
      });
      return [firing(value, rule)];
    }
    if (state) {
      state.lastValue = value;
      state.lastObservedAt = at;
    }
    return [];
  }

  const previousValue = state.lastValue;
  state.lastValue = value;
  state.lastObservedAt = at;

  const cooldownElapsed =
    state.lastFiredAt === null || at.getTime() - state.lastFiredAt.getTime() >= rule.cooldownMs;
  if (!cooldownElapsed) return [];

  if (value < rule.recoveryThreshold) {
    state.phase = 'normal';
    state.isActive = false;
    return [recovered(value, rule)];
  }

  if (value >= rule.threshold) {
    const transitions: AlertTransition[] = [];
    if (previousValue < rule.recoveryThreshold) {
      transitions.push(recovered(previousValue, rule));
    }
    state.lastFiredAt = at;
    state.isActive = true;
    transitions.push(firing(value, rule));
    return transitions;
  }

  // Hysteresis band: stay in cooldown until the value clearly recovers.
  return [];
}
