import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { metricSnapshotSchema } from '@hostpulse/shared';
import type { MetricSnapshot } from '@hostpulse/shared';

const { si } = vi.hoisted(() => ({
  si: {
    currentLoad: vi.fn(),
    cpu: vi.fn(),
    mem: vi.fn(),
    fsSize: vi.fn(),
    disksIO: vi.fn(),
    fsStats: vi.fn(),
    networkStats: vi.fn(),
  },
}));

vi.mock('systeminformation', () => ({ default: si }));

vi.mock('node:os', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:os')>();
  return { ...actual, loadavg: () => [1.5, 1.25, 1] };
});

import { Sampler } from '../Sampler.js';
import { asLogger, createMockLogger } from './helpers.js';

function installHealthyHost(): void {
  si.currentLoad.mockResolvedValue({ currentLoad: 42.123, cpus: [{ load: 40 }, { load: 44.246 }] });
  si.cpu.mockResolvedValue({ physicalCores: 2, cores: 4 });
  si.mem.mockResolvedValue({
    total: 1000,
    free: 200,
    available: 300,
    swaptotal: 500,
    swapused: 100,
    swapfree: 400,
  });
  si.fsSize.mockResolvedValue([
    { fs: '/dev/sda1', type: 'ext4', size: 1000, used: 600, available: 400, use: 60, mount: '/' },
    { fs: 'tmpfs', type: 'tmpfs', size: 0, used: 0, available: 0, use: 0, mount: '/run' },
    { fs: '/dev/sda1', type: 'ext4', size: 1000, used: 600, available: 400, use: 60, mount: '/' },
  ]);
  si.disksIO.mockResolvedValue({ rIO: 10, wIO: 20 });
  si.fsStats.mockResolvedValue({ rx: 4096, wx: 8192 });
  si.networkStats.mockResolvedValue([
    { iface: 'eth0', rx_bytes: 100, tx_bytes: 50, rx_errors: 1, tx_errors: 0, rx_dropped: 2, tx_dropped: 0 },
    { iface: 'lo', rx_bytes: 10, tx_bytes: 10, rx_errors: 0, tx_errors: 0, rx_dropped: 0, tx_dropped: 0 },
  ]);
}

describe('Sampler', () => {
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    vi.clearAllMocks();
    logger = createMockLogger();
    installHealthyHost();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createSampler(): Sampler {
    return new Sampler({ hostname: 'h1', intervalMs: 30_000, logger: asLogger(logger) });
  }

  describe('collect', () => {
    it('should assemble a complete snapshot', async () => {
      const snapshot = await createSampler().collect();

      expect(snapshot.hostname).toBe('h1');
      expect(snapshot.timestamp).toBeInstanceOf(Date);
      expect(snapshot.cpu).toEqual({
        overall_percent: 42.12,
        per_core_percent: [40, 44.25],
        load_avg_1_5_15: [1.5, 1.25, 1],
        core_count_physical: 2,
        core_count_logical: 4,
      });
      expect(snapshot.memory).toEqual({
        total_bytes: 1000,
        used_bytes: 700,
        free_bytes: 200,
        available_bytes: 300,
        percent_used: 70,
      });
      expect(snapshot.swap).toEqual({
        total_bytes: 500,
        used_bytes: 100,
        free_bytes: 400,
        percent_used: 20,
      });
      expect(snapshot.disk.io).toEqual({
        read_count: 10,
        write_count: 20,
        read_bytes: 4096,
        write_bytes: 8192,
      });
      expect(snapshot.network).toEqual({
        bytes_sent: 60,
        bytes_recv: 110,
        errors_in: 1,
        errors_out: 0,
        drops_in: 2,
        drops_out: 0,
      });
    });

    it('should read every network interface', async () => {
      await createSampler().collect();
      expect(si.networkStats).toHaveBeenCalledWith('*');
    });

    it('should skip sizeless filesystems and duplicate mount points', async () => {
      const snapshot = await createSampler().collect();

      expect(snapshot.disk.filesystems).toHaveLength(1);
      expect(snapshot.disk.filesystems[0]).toMatchObject({
        mount_point: '/',
        device: '/dev/sda1',
        fs_type: 'ext4',
        total_bytes: 1000,
        used_bytes: 600,
        free_bytes: 400,
        percent_used: 60,
      });
    });

    it('should produce a snapshot that passes ingestion validation', async () => {
      const snapshot = await createSampler().collect();
      expect(metricSnapshotSchema.safeParse(snapshot).success).toBe(true);
    });

    it('should freeze the snapshot', async () => {
      const snapshot = await createSampler().collect();
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.cpu)).toBe(true);
      expect(Object.isFrozen(snapshot.disk.filesystems)).toBe(true);
    });

    it('should clamp out-of-range readings', async () => {
      si.currentLoad.mockResolvedValue({ currentLoad: 104.7, cpus: [{ load: -3 }] });
      si.fsSize.mockResolvedValue([
        { fs: '/dev/sdb1', type: 'xfs', size: 100, used: 90, available: 40, use: 90, mount: '/data' },
      ]);

      const snapshot = await createSampler().collect();

      expect(snapshot.cpu.overall_percent).toBe(100);
      expect(snapshot.cpu.per_core_percent).toEqual([0]);
      expect(snapshot.disk.filesystems[0]).toMatchObject({ used_bytes: 90, free_bytes: 10 });
    });

    it('should zero-fill memory and omit swap when memory cannot be read', async () => {
      si.mem.mockRejectedValue(new Error('EACCES'));

      const snapshot = await createSampler().collect();

      expect(snapshot.memory).toEqual({
        total_bytes: 0,
        used_bytes: 0,
        free_bytes: 0,
        available_bytes: 0,
        percent_used: 0,
      });
      expect(snapshot.swap).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ section: 'memory', hostname: 'h1' }),
        'Metric section unavailable',
      );
      const [context] = logger.warn.mock.calls[0];
      expect(context.err.message).toBe('Failed to collect memory metrics: EACCES');
    });

    it('should omit swap on hosts without swap', async () => {
      si.mem.mockResolvedValue({
        total: 1000,
        free: 500,
        available: 500,
        swaptotal: 0,
        swapused: 0,
        swapfree: 0,
      });

      const snapshot = await createSampler().collect();
      expect(snapshot.swap).toBeUndefined();
      expect('swap' in snapshot).toBe(false);
    });

    it('should keep other sections when one fails', async () => {
      si.currentLoad.mockRejectedValue(new Error('boom'));
      si.disksIO.mockRejectedValue(new Error('no block devices'));

      const snapshot = await createSampler().collect();

      expect(snapshot.cpu).toEqual({
        overall_percent: 0,
        per_core_percent: [],
        load_avg_1_5_15: [0, 0, 0],
      });
      expect(snapshot.disk.io).toBeUndefined();
      expect(snapshot.memory.percent_used).toBe(70);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });

    it('should omit disk io when the platform reports none', async () => {
      si.disksIO.mockResolvedValue(null);
      const snapshot = await createSampler().collect();
      expect(snapshot.disk.io).toBeUndefined();
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  describe('start/stop', () => {
    it('should collect immediately and then on every interval', async () => {
      vi.useFakeTimers();
      const sampler = createSampler();
      const received: MetricSnapshot[] = [];
      sampler.on('snapshot', (snapshot: MetricSnapshot) => received.push(snapshot));

      sampler.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(received).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(30_000);
      expect(received).toHaveLength(2);

      await vi.advanceTimersByTimeAsync(60_000);
      expect(received).toHaveLength(4);

      sampler.stop();
      expect(sampler.isRunning()).toBe(false);
      await vi.advanceTimersByTimeAsync(60_000);
      expect(received).toHaveLength(4);
    });

    it('should skip a tick while the previous collection is still running', async () => {
      vi.useFakeTimers();
      let release: (value: unknown) => void = () => {};
      si.currentLoad.mockImplementationOnce(
        () =>
          new Promise((resolve) => {
            release = resolve;
          }),
      );

      const sampler = createSampler();
      const listener = vi.fn();
      sampler.on('snapshot', listener);

      sampler.start();
      await vi.advanceTimersByTimeAsync(30_000);

      expect(listener).not.toHaveBeenCalled();
      expect(sampler.getSkippedTicks()).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { hostname: 'h1', skipped: 1 },
        'Previous collection still running, skipping tick',
      );

      release({ currentLoad: 10, cpus: [] });
      await vi.advanceTimersByTimeAsync(0);
      expect(listener).toHaveBeenCalledTimes(1);

      sampler.stop();
    });

    it('should ignore a second start', () => {
      vi.useFakeTimers();
      const sampler = createSampler();
      sampler.start();
      sampler.start();
      expect(si.currentLoad).toHaveBeenCalledTimes(1);
      sampler.stop();
    });
  });
});
