#!/usr/bin/env node
import { createLogger, getLogger, loadIngestionConfig, setDefaultLogger } from '@hostpulse/shared';
import { IngestionServer } from './IngestionServer.js';

async function main(): Promise<void> {
  const config = loadIngestionConfig(process.argv[2]);
  if (config.log_level) {
    setDefaultLogger(
      createLogger({ level: config.log_level, pretty: process.env.NODE_ENV === 'development' }),
    );
  }
  const logger = getLogger();

  const server = new IngestionServer(config);
  await server.start();

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await server.stop();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Ingestion server shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}

main().catch((err) => {
  process.stderr.write(
    `hostpulse ingestion server failed to start: ${err instanceof Error ? err.message : err}\n`,
  );
  process.exit(1);
});
