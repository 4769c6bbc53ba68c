#!/usr/bin/env node

import { FilteredStdioServerTransport } from './custom-stdio.js';
import { createServer } from './server.js';
import { configManager } from './config-manager.js';
import { createReplaceManager } from './replace-manager.js';
import { APP_NAME } from './config.js';
import { setLogLevel, setLogSink, logger } from './utils/logger.js';

function fatal(prefix: string, error: unknown): never {
  const errorMessage = error instanceof Error ? error.message : String(error);
  process.stderr.write(JSON.stringify({
    type: 'error',
    timestamp: new Date().toISOString(),
    message: `${prefix}: ${errorMessage}`
  }) + '\n');
  process.exit(1);
}

async function runServer(): Promise<void> {
  try {
    process.stderr.write(`[${APP_NAME}] Loading configuration from ${configManager.filePath}\n`);
    const config = await configManager.loadConfig();
    setLogLevel(config.logLevel);

    const transport = new FilteredStdioServerTransport();
    const server = createServer({ manager: createReplaceManager(configManager), config: configManager });

    server.oninitialized = () => {
      transport.enableNotifications();
      setLogSink(transport);
      const client = server.getClientVersion();
      logger.info(`Client connected: ${client?.name ?? 'unknown'} v${client?.version ?? 'unknown'}`);
    };

    process.on('uncaughtException', (error) => {
      const errorMessage = error instanceof Error ? error.message : String(error);

      // Malformed input from the client must not take the server down
      if (errorMessage.includes('JSON') && errorMessage.includes('Unexpected token')) {
        process.stderr.write(`[${APP_NAME}] JSON parsing error: ${errorMessage}\n`);
        return;
      }
      fatal('Uncaught exception', error);
    });

    process.on('unhandledRejection', (reason) => {
      fatal('Unhandled rejection', reason);
    });

    await server.connect(transport);
    process.stderr.write(`[${APP_NAME}] Server connected\n`);
  } catch (error) {
    fatal('Failed to start server', error);
  }
}

runServer().catch((error: unknown) => {
  fatal('Fatal error running server', error);
});
