#!/usr/bin/env node

/**
 * HTTP server entry point
 */

import { startServer } from './server/server';
import { defaultLogger } from './utils/logger';
import { toError } from './utils/error-handler';

export async function main(): Promise<void> {
  const running = await startServer();

  const shutdown = (signal: string): void => {
    defaultLogger.info(`Received ${signal}, shutting down`, undefined, 'shutdown');
    running.close().then(
      () => process.exit(0),
      error => {
        defaultLogger.error('Shutdown failed', toError(error), undefined, 'shutdown');
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch(error => {
    defaultLogger.fatal('Failed to start server', toError(error), undefined, 'startup');
    process.exit(1);
  });
}
