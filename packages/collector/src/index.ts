export { Sampler } from './Sampler.js';
export { SnapshotQueue } from './SnapshotQueue.js';
export { TransmissionClient } from './TransmissionClient.js';
export { CollectorAgent } from './CollectorAgent.js';
export { computeBackoff } from './backoff.js';

export type { CollectorAgentDeps } from './CollectorAgent.js';
export type {
  TransmissionState,
  DeliveryStatus,
  DeliveryResult,
  DeliveryAttempt,
  TransmissionStats,
  CollectorStats,
  BackoffOptions,
  TransmissionOptions,
  SamplerOptions,
} from './types.js';
