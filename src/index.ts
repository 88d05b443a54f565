/**
 * Namecheap DNS Functions Entry Point
 *
 * IMPORTANT: dotenv must be loaded BEFORE any other imports
 * to ensure environment variables are available to all modules
 */

// Load environment variables FIRST (before any other imports)
import dotenv from 'dotenv';
dotenv.config();

import http from 'http';
import { createApp, createRegistry } from './app';
import { loadConfig, validateConfig } from './config';
import { logger, setLogLevel } from './middleware/logging';

function startServer(): void {
  try {
    const config = loadConfig();

    // Validate configuration before starting
    validateConfig(config);
    setLogLevel(config.logLevel);

    const registry = createRegistry(config);
    const app = createApp({ config, registry });

    const server = http.createServer(app).listen(config.port, config.host, () => {
      logger.info({
        event: 'server_started',
        url: `http://${config.host}:${config.port}`,
        environment: config.nodeEnv,
        sandbox: config.namecheap.sandbox,
        auth: config.serverApiKey ? 'bearer' : 'none',
        functions: registry.listFunctions().map((fn) => fn.name),
      });
    });

    server.on('error', (error) => {
      logger.fatal({ event: 'server_error', error: error.message });
      process.exit(1);
    });

    const shutdown = (signal: string) => {
      logger.info({ event: 'server_stopping', signal });
      server.close(() => process.exit(0));
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.fatal({ event: 'startup_failed', error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

startServer();
