#!/usr/bin/env node

/**
 * HTTP server exposing the torrent client
 *
 * Usage:
 *   npm run build && npm start
 *
 * Then, with a daemon listening on RPC_URL:
 *   curl http://localhost:3000/torrents?status=seeding
 */

import path from 'path';
import config from '../../config';
import { createApp } from './app';
import { ILogger } from '../../domain/interfaces';
import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { FileLogger } from '../../infrastructure/logging/FileLogger';

const loggers: ILogger[] = [new ConsoleLogger(config.LOG_LEVEL)];
if (config.LOG_TO_FILE) {
  loggers.push(new FileLogger(path.join(config.RUNTIME_DIR, 'logs'), config.LOG_LEVEL));
}
const logger = new CompositeLogger(...loggers);

const app = createApp(undefined, logger);

const server = app.listen(config.PORT, () => {
  logger.info(`Torrent client API running on http://localhost:${config.PORT}`);
  logger.info(`Daemon RPC endpoint: ${config.RPC_URL}`);
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, stopping server...`);
  server.close(() => {
    logger.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
