#!/usr/bin/env node
import { createHttpApp } from './http-server.js';
import { configManager } from './config-manager.js';
import { createReplaceManager } from './replace-manager.js';
import { APP_NAME } from './config.js';
import { logToStderr, setLogLevel } from './utils/logger.js';

async function main(): Promise<void> {
  const config = await configManager.loadConfig();
  setLogLevel(config.logLevel);

  const app = createHttpApp(createReplaceManager(configManager));
  const server = app.listen(config.httpPort, config.httpHost, () => {
    logToStderr('info', `${APP_NAME} HTTP API listening on http://${config.httpHost}:${config.httpPort}`);
  });

  const shutdown = (): void => {
    logToStderr('info', 'Shutting down HTTP API');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logToStderr('error', `Failed to start HTTP API: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
