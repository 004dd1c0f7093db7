import { vi } from 'vitest';
import type { Logger, MetricSnapshot } from '@hostpulse/shared';

export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function asLogger(mock: ReturnType<typeof createMockLogger>): Logger {
  return mock as unknown as Logger;
}

export function makeSnapshot(hostname: string = 'h1', at: string = '2024-05-01T12:00:00.000Z'): MetricSnapshot {
  return {
    hostname,
    timestamp: new Date(at),
    cpu: { overall_percent: 12.5, per_core_percent: [10, 15], load_avg_1_5_15: [0.1, 0.2, 0.3] },
    memory: {
      total_bytes: 1000,
      used_bytes: 400,
      free_bytes: 600,
      available_bytes: 600,
      percent_used: 40,
    },
    disk: { filesystems: [] },
    network: { bytes_sent: 0, bytes_recv: 0, errors_in: 0, errors_out: 0 },
  };
}
