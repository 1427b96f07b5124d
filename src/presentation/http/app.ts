import express, { Express } from 'express';
import config from '../../config';
import { createUseCases, UseCaseOptions } from '../../application/use-cases';
import { ILogger, IRpcTransport } from '../../domain/interfaces';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { TransmissionRpcTransport } from '../../infrastructure/transmission/TransmissionRpcTransport';
import { TorrentController } from './controllers/TorrentController';
import { createErrorHandler } from './middleware/errorHandler';
import { createTorrentRoutes } from './routes/torrent.routes';

/**
 * Creates and configures Express application
 * Can be used both for production server and testing
 */
export function createApp(
    transport?: IRpcTransport,
    logger?: ILogger,
    options: UseCaseOptions = {}
): Express {
    // Initialize dependencies (allow injection for testing)
    const appLogger = logger || new ConsoleLogger(config.LOG_LEVEL);
    const rpc = transport || new TransmissionRpcTransport({
        url: config.RPC_URL,
        username: config.RPC_USERNAME,
        password: config.RPC_PASSWORD,
        timeout: config.RPC_TIMEOUT
    }, appLogger);

    // Initialize use cases and controllers
    const useCases = createUseCases(rpc, appLogger, options);
    const torrentController = new TorrentController(useCases);

    // Initialize Express app
    const app: Express = express();
    app.use(express.json());

    // Setup routes
    app.use('/', createTorrentRoutes(torrentController));
    app.use(createErrorHandler(appLogger));

    return app;
}
