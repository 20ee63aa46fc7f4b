/**
 * Entry point for the HTTP service.
 */

import { loadConfig } from './config';
import { AppError } from './domain/errors';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';

function main(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const app = createApp(createAppContext(config));
  app.listen(config.port, () => {
    logger.info('docflow listening', {
      port: config.port,
      documentApiBaseUrl: config.documentApiBaseUrl,
      executionTimeoutMs: config.executionTimeoutMs,
    });
  });
}

try {
  main();
} catch (err) {
  if (err instanceof AppError) {
    logger.error('Startup failed', { code: err.code, message: err.message });
  } else {
    logger.error('Startup failed', { message: err instanceof Error ? err.message : String(err) });
  }
  process.exitCode = 1;
}
