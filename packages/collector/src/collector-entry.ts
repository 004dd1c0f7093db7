#!/usr/bin/env node
import { createLogger, getLogger, loadCollectorConfig, setDefaultLogger } from '@hostpulse/shared';
import { CollectorAgent } from './CollectorAgent.js';

async function main(): Promise<void> {
  const config = loadCollectorConfig(process.argv[2]);
  if (config.log_level) {
    setDefaultLogger(
      createLogger({ level: config.log_level, pretty: process.env.NODE_ENV === 'development' }),
    );
  }
  const logger = getLogger();

  const agent = new CollectorAgent(config);

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await agent.stop();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Collector shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));

  agent.start();
}

main().catch((err) => {
  process.stderr.write(`hostpulse collector failed to start: ${err instanceof Error ? err.message : err}\n`);
  process.exit(1);
});
