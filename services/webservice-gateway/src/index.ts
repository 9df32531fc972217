import { createDb } from '@generic-interface/database';
import { createService, logger, startService } from '@generic-interface/service-template';
import { loadConfig } from './config';
import { WebserviceFieldService } from './fields/WebserviceFieldService';
import { createWebserviceHandlers } from './handlers';
import { DrizzleWebserviceRepository } from './repository/DrizzleWebserviceRepository';
import { createRouter } from './routes';
import { GenericInterfaceService } from './service/GenericInterfaceService';
import { createDefaultTransports } from './transports';

const config = loadConfig();
const { db, pool } = createDb(config.databaseUrl);

const service = new GenericInterfaceService({
    repository: new DrizzleWebserviceRepository(db),
    transports: createDefaultTransports({ defaultTimeoutMs: config.defaultTimeoutMs }),
    cacheTtlMs: config.cacheTtlMs,
});
const fieldService = new WebserviceFieldService(service);

const app = createService(config.serviceName);
app.use(createRouter(createWebserviceHandlers({ service, fieldService })));

const server = startService(app, config.port);

const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
        pool.end().then(
            () => process.exit(0),
            (err: unknown) => {
                logger.error('Failed to close database pool', { error: err instanceof Error ? err.message : String(err) });
                process.exit(1);
            }
        );
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
