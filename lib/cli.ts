#!/usr/bin/env node
import { CONFIG, loadSyncConfig, SyncConfig } from './config';
import { ConfigError } from './errors';
import logger from './logger';
import { startMetricsServer } from './metricsServer';
import { runForever } from './scheduler';

async function main(): Promise<number> {
  let config: SyncConfig;
  try {
    config = loadSyncConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ err }, `configuration error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down after the current step');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const metrics = CONFIG.METRICS_PORT ? startMetricsServer(CONFIG.METRICS_PORT) : null;
  try {
    await runForever(config, { signal: controller.signal });
  } finally {
    metrics?.close();
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ err }, 'unexpected failure');
    process.exitCode = 1;
  },
);
