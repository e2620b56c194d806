#!/usr/bin/env node

import dotenv from 'dotenv';
import { BridgeRelayerApp } from './app';
import { getConfig, getEnvVars } from './config';
import { describeError } from './errors';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

async function main(): Promise<number> {
  logger.info('Starting bridge relayer');

  const env = getEnvVars();
  const config = getConfig(env);
  logger.info('Configuration loaded', {
    source: config.source.name,
    destination: config.destination.name,
    submissionMode: config.submission.mode,
    pollingIntervalMs: config.pollingIntervalMs
  });

  const app = new BridgeRelayerApp(config, env.PRIVATE_KEY);
  setupShutdownHandlers(app);

  const finalState = await app.start();
  return finalState === 'stopped' ? 0 : 1;
}

// Stop between iterations on SIGINT/SIGTERM
function setupShutdownHandlers(app: BridgeRelayerApp) {
  const shutdown = () => app.stop();

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().then(
  code => process.exit(code),
  (error: unknown) => {
    logger.error(`Failed to run relayer: ${describeError(error)}`, {
      stack: error instanceof Error ? error.stack : undefined
    });
    process.exit(1);
  }
);
