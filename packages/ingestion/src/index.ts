// Storage
export { resolveQuery, compareSnapshots } from './storage/StorageAdapter.js';
export type { StorageAdapter, StorageBackend, ResolvedQuery } from './storage/StorageAdapter.js';
export { createStorage } from './storage/createStorage.js';
export { SqliteStorage } from './storage/sqlite/SqliteStorage.js';
export { openDatabase, IN_MEMORY } from './storage/sqlite/Database.js';
export { InfluxStorage } from './storage/influx/InfluxStorage.js';
export { InfluxPointStore, buildRangeQuery } from './storage/influx/InfluxPointStore.js';
export type { InfluxPointStoreOptions } from './storage/influx/InfluxPointStore.js';
export type { PointStore, PointRange } from './storage/influx/PointStore.js';
export { snapshotToPoints, pointsToSnapshots, rowToPoint } from './storage/influx/points.js';
export type { SeriesPoint, Measurement } from './storage/influx/points.js';

// Alerts
export { AlertEngine, buildAlertPolicy, formatAlertMessage } from './alerts/AlertEngine.js';
export type { AlertEngineOptions } from './alerts/AlertEngine.js';
export {
  evaluateObservation,
  extractObservations,
  computeSeverity,
  alertKeyToString,
} from './alerts/stateMachine.js';
export type { Observation, AlertTransition, AlertStateMap } from './alerts/stateMachine.js';
export { AlertDispatcher } from './alerts/AlertDispatcher.js';
export type { AlertDispatcherOptions, DispatchStats } from './alerts/AlertDispatcher.js';
export { AlertHistory } from './alerts/AlertHistory.js';
export * from './alerts/channels/index.js';

// Service, events and HTTP
export { EventBus } from './events/EventBus.js';
export type { EventName, SnapshotAcceptedEvent, SnapshotRejectedEvent } from './events/EventBus.js';
export { IngestionService } from './service/IngestionService.js';
export type { IngestionServiceOptions, HealthStatus } from './service/IngestionService.js';
export { HTTPServer } from './api/HTTPServer.js';
export type { HTTPServerOptions } from './api/HTTPServer.js';
export { metricsQuerySchema } from './api/routes/metrics.js';
export { alertsQuerySchema } from './api/routes/alerts.js';
export { IngestionServer } from './server/IngestionServer.js';
export type { IngestionServerDeps } from './server/IngestionServer.js';
