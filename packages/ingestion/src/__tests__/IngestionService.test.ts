import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ServiceUnavailableError, StorageError, ingestionConfigSchema } from '@hostpulse/shared';
import type { AlertEvent, MetricSnapshot } from '@hostpulse/shared';
import { IngestionService } from '../service/IngestionService.js';
import { AlertEngine, buildAlertPolicy } from '../alerts/AlertEngine.js';
import { AlertDispatcher } from '../alerts/AlertDispatcher.js';
import { AlertHistory } from '../alerts/AlertHistory.js';
import type { NotificationChannel } from '../alerts/channels/NotificationChannel.js';
import { EventBus } from '../events/EventBus.js';
import { SqliteStorage } from '../storage/sqlite/SqliteStorage.js';
import { IN_MEMORY, openDatabase } from '../storage/sqlite/Database.js';
import type { StorageAdapter } from '../storage/StorageAdapter.js';
import { MINUTE, asLogger, at, createMockLogger, makeSnapshot, toWire } from './helpers.js';

function stubStorage(overrides: Partial<StorageAdapter> = {}): StorageAdapter {
  return {
    backend: 'sqlite',
    write: vi.fn(async () => {}),
    query: vi.fn(async () => []),
    ping: vi.fn(async () => {}),
    close: vi.fn(async () => {}),
    ...overrides,
  };
}

function recordingChannel() {
  const sent: AlertEvent[] = [];
  const channel: NotificationChannel = {
    name: 'webhook',
    send: async (event) => {
      sent.push(event);
    },
  };
  return { channel, sent };
}

interface Harness {
  service: IngestionService;
  storage: StorageAdapter;
  dispatcher: AlertDispatcher;
  history: AlertHistory;
  eventBus: EventBus;
  sent: AlertEvent[];
  logger: ReturnType<typeof createMockLogger>;
}

function createHarness(
  options: { storage?: StorageAdapter; notifyRecovery?: boolean; channel?: NotificationChannel } = {},
): Harness {
  const logger = createMockLogger();
  const config = ingestionConfigSchema.parse({ storage: { backend: 'sqlite' } });
  const storage = options.storage ?? new SqliteStorage(openDatabase(IN_MEMORY), asLogger(logger));
  const recording = recordingChannel();
  const engine = new AlertEngine({
    policy: buildAlertPolicy(config.thresholds, config.alerts),
    logger: asLogger(logger),
  });
  const dispatcher = new AlertDispatcher({
    channels: [options.channel ?? recording.channel],
    retries: 1,
    retryDelay: 0,
    notifyRecovery: options.notifyRecovery,
    logger: asLogger(logger),
  });
  const history = new AlertHistory(10);
  const eventBus = new EventBus();
  const service = new IngestionService({
    storage,
    engine,
    dispatcher,
    history,
    eventBus,
    logger: asLogger(logger),
  });
  return { service, storage, dispatcher, history, eventBus, sent: recording.sent, logger };
}

function ingest(service: IngestionService, snapshot: MetricSnapshot) {
  const wire = toWire(snapshot);
  return service.ingest(wire.hostname, wire.metrics);
}

describe('IngestionService', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  afterEach(async () => {
    await harness.storage.close();
  });

  describe('ingest', () => {
    it('should accept and store a valid snapshot', async () => {
      const accepted = vi.fn();
      harness.eventBus.on('snapshot:accepted', accepted);

      const snapshot = makeSnapshot();
      await expect(ingest(harness.service, snapshot)).resolves.toEqual({ status: 'accepted' });

      expect(await harness.service.query()).toEqual([snapshot]);
      expect(accepted).toHaveBeenCalledWith({ hostname: 'h1', timestamp: at(0) });
    });

    it('should reject an out-of-range percentage with the offending field', async () => {
      const rejected = vi.fn();
      harness.eventBus.on('snapshot:rejected', rejected);

      const result = await ingest(harness.service, makeSnapshot({ cpu: 150 }));

      const reason = 'metrics.cpu.overall_percent: Number must be less than or equal to 100';
      expect(result).toEqual({ status: 'rejected', reason });
      expect(rejected).toHaveBeenCalledWith({ hostname: 'h1', reason });
      expect(harness.logger.warn).toHaveBeenCalledWith({ hostname: 'h1', reason }, 'Snapshot rejected');
      expect(await harness.service.query()).toEqual([]);
    });

    it('should reject a snapshot whose hostname differs from the envelope', async () => {
      const wire = toWire(makeSnapshot({ hostname: 'h1' }));

      const result = await harness.service.ingest('h2', wire.metrics);
      expect(result).toEqual({
        status: 'rejected',
        reason: 'metrics.hostname: does not match envelope hostname "h2"',
      });
    });

    it('should reject a payload without metrics', async () => {
      const result = await harness.service.ingest('h1', undefined);
      expect(result).toEqual({ status: 'rejected', reason: 'metrics: Required' });
    });

    it('should reject a snapshot without a timestamp', async () => {
      const wire = toWire(makeSnapshot());
      delete wire.metrics.timestamp;

      const result = await harness.service.ingest(wire.hostname, wire.metrics);
      expect(result.status).toBe('rejected');
      expect(result.status === 'rejected' ? result.reason : '').toMatch(/^metrics\.timestamp: /);
    });

    it('should reject a future-dated snapshot and keep alerting on later ones', async () => {
      const result = await ingest(
        harness.service,
        makeSnapshot({ cpu: 95, timestamp: new Date('2099-01-01T00:00:00Z') }),
      );
      expect(result).toEqual({
        status: 'rejected',
        reason: 'metrics.timestamp: Timestamp is more than 5 minutes ahead of the server clock',
      });

      await ingest(harness.service, makeSnapshot({ cpu: 95, timestamp: at(0) }));
      expect(harness.history.list().map((event) => event.kind)).toEqual(['firing']);
    });

    it('should leave the hostname out of the rejection event when it is not a string', async () => {
      const rejected = vi.fn();
      harness.eventBus.on('snapshot:rejected', rejected);

      await harness.service.ingest(42, toWire(makeSnapshot()).metrics);

      expect(rejected).toHaveBeenCalledWith({
        hostname: undefined,
        reason: 'hostname: Expected string, received number',
      });
    });

    it('should not evaluate alerts for a rejected snapshot', async () => {
      await ingest(harness.service, makeSnapshot({ cpu: 150, memory: 99 }));
      expect(harness.history.size()).toBe(0);
    });

    it('should keep one record when the same snapshot arrives twice', async () => {
      await ingest(harness.service, makeSnapshot());
      await expect(ingest(harness.service, makeSnapshot())).resolves.toEqual({ status: 'accepted' });

      expect(await harness.service.query()).toHaveLength(1);
    });

    it('should throw a StorageError when the write fails and still evaluate alerts', async () => {
      const storage = stubStorage({
        write: vi.fn(async () => {
          throw new Error('disk full');
        }),
      });
      harness = createHarness({ storage });

      const result = ingest(harness.service, makeSnapshot({ cpu: 92 }));
      await expect(result).rejects.toBeInstanceOf(StorageError);
      await expect(result).rejects.toThrow('[sqlite] Write failed: disk full');

      expect(harness.history.list().map((event) => event.kind)).toEqual(['firing']);
      expect(harness.logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ hostname: 'h1' }),
        'Failed to store snapshot',
      );
      expect(harness.service.getInFlightCount()).toBe(0);
    });

    it('should pass storage errors through unchanged', async () => {
      const error = new StorageError('sqlite', 'database is locked');
      harness = createHarness({
        storage: stubStorage({
          write: vi.fn(async () => {
            throw error;
          }),
        }),
      });

      await expect(ingest(harness.service, makeSnapshot())).rejects.toBe(error);
    });

    it('should not wait for alert notifications', async () => {
      const send = vi.fn(() => new Promise<void>(() => {}));
      harness = createHarness({ channel: { name: 'slack', send } });

      await expect(ingest(harness.service, makeSnapshot({ cpu: 92 }))).resolves.toEqual({
        status: 'accepted',
      });
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('should emit alert events on the bus', async () => {
      const fired = vi.fn();
      harness.eventBus.on('alert:fired', fired);

      await ingest(harness.service, makeSnapshot({ cpu: 92 }));

      expect(fired).toHaveBeenCalledTimes(1);
      expect(fired.mock.calls[0][0]).toMatchObject({ kind: 'firing', value: 92 });
    });
  });

  describe('alert scenario', () => {
    async function runScenario(service: IngestionService) {
      await ingest(service, makeSnapshot({ cpu: 92, timestamp: at(0) }));
      await ingest(service, makeSnapshot({ cpu: 95, timestamp: at(MINUTE) }));
      await ingest(service, makeSnapshot({ cpu: 30, timestamp: at(6 * MINUTE) }));
    }

    it('should fire, suppress and recover, notifying only the firing by default', async () => {
      await runScenario(harness.service);
      await harness.dispatcher.flush();

      expect(harness.service.getAlerts().map((event) => event.message)).toEqual([
        'cpu on h1 at 92% (threshold 80%)',
        'cpu on h1 recovered at 30% (below 80%)',
      ]);
      expect(harness.sent.map((event) => event.kind)).toEqual(['firing']);
      expect(await harness.service.query()).toHaveLength(3);
    });

    it('should notify the recovery when enabled', async () => {
      harness = createHarness({ notifyRecovery: true });

      await runScenario(harness.service);
      await harness.dispatcher.flush();

      expect(harness.sent.map((event) => [event.kind, event.severity])).toEqual([
        ['firing', 'error'],
        ['recovered', 'info'],
      ]);
    });
  });

  describe('query', () => {
    it('should wrap unexpected failures in a StorageError', async () => {
      harness = createHarness({
        storage: stubStorage({
          query: vi.fn(async () => {
            throw new Error('boom');
          }),
        }),
      });

      await expect(harness.service.query()).rejects.toThrow('[sqlite] Query failed: boom');
    });

    it('should pass the filter to storage', async () => {
      const query = vi.fn(async () => []);
      harness = createHarness({ storage: stubStorage({ query }) });

      await harness.service.query({ host: 'h1', limit: 5 });
      expect(query).toHaveBeenCalledWith({ host: 'h1', limit: 5 });
    });
  });

  describe('health', () => {
    it('should report ok when storage is reachable', async () => {
      expect(await harness.service.health()).toEqual({ status: 'ok' });
    });

    it('should report the storage failure', async () => {
      harness = createHarness({
        storage: stubStorage({
          ping: vi.fn(async () => {
            throw new StorageError('influxdb', 'Server is not reachable: timeout');
          }),
        }),
      });

      expect(await harness.service.health()).toEqual({
        status: 'unavailable',
        reason: '[influxdb] Server is not reachable: timeout',
      });
    });
  });

  describe('shutdown', () => {
    it('should refuse snapshots once it stops accepting', async () => {
      harness.service.stopAccepting();

      expect(harness.service.isAccepting()).toBe(false);
      await expect(ingest(harness.service, makeSnapshot())).rejects.toBeInstanceOf(
        ServiceUnavailableError,
      );
      expect(await harness.service.health()).toEqual({
        status: 'unavailable',
        reason: 'shutting down',
      });
    });

    it('should drain in-flight writes', async () => {
      let finishWrite: () => void = () => {};
      const storage = stubStorage({
        write: vi.fn(
          () =>
            new Promise<void>((resolve) => {
              finishWrite = resolve;
            }),
        ),
      });
      harness = createHarness({ storage });

      const pending = ingest(harness.service, makeSnapshot());
      expect(harness.service.getInFlightCount()).toBe(1);

      harness.service.stopAccepting();
      expect(await harness.service.drain(10)).toBe(false);
      expect(harness.logger.warn).toHaveBeenCalledWith(
        { pending: 1, remaining: 1, timeoutMs: 10 },
        'In-flight writes did not finish before the grace period elapsed',
      );

      finishWrite();
      expect(await harness.service.drain(1000)).toBe(true);
      await expect(pending).resolves.toEqual({ status: 'accepted' });
      expect(harness.service.getInFlightCount()).toBe(0);
    });

    it('should drain immediately when idle', async () => {
      expect(await harness.service.drain(0)).toBe(true);
    });
  });
});
