import { StorageError, getLogger } from '@hostpulse/shared';
import type { Logger, StorageConfig } from '@hostpulse/shared';
import type { StorageAdapter } from './StorageAdapter.js';
import { SqliteStorage } from './sqlite/SqliteStorage.js';
import { InfluxStorage } from './influx/InfluxStorage.js';
import { InfluxPointStore } from './influx/InfluxPointStore.js';

/** Instantiate the backend named by `storage.backend`. Does not check reachability. */
export function createStorage(config: StorageConfig, logger?: Logger): StorageAdapter {
  const log = logger ?? getLogger().child({ component: 'storage' });

  switch (config.backend) {
    case 'sqlite':
      log.info({ path: config.sqlite.path }, 'Using SQLite storage');
      return SqliteStorage.open(config.sqlite.path, log.child({ backend: 'sqlite' }));
    case 'influxdb': {
      const influx = config.influxdb;
      if (!influx) {
        throw new StorageError('influxdb', 'storage.influxdb is not configured');
      }
      log.info({ url: influx.url, org: influx.org, bucket: influx.bucket }, 'Using InfluxDB storage');
      return new InfluxStorage(
        new InfluxPointStore({
          url: influx.url,
          token: influx.token,
          org: influx.org,
          bucket: influx.bucket,
          timeout: influx.timeout,
        }),
        log.child({ backend: 'influxdb' }),
      );
    }
  }
}
