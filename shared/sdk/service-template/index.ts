import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import * as winston from 'winston';
import { Server } from 'http';

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.json(),
    defaultMeta: { service: process.env.SERVICE_NAME || 'unknown-service' },
    transports: [
        new winston.transports.Console()
    ]
});

export type Logger = winston.Logger;

/** Child logger tagged with the component that emits it. */
export const componentLogger = (component: string): Logger => logger.child({ component });

export const createService = (name: string): Express => {
    const app = express();

    app.use(cors());
    app.use(bodyParser.json({ limit: '5mb' }));

    // Request logging
    app.use((req: Request, res: Response, next: NextFunction) => {
        const startedAt = Date.now();
        const traceId = req.headers['x-trace-id'] || 'unknown';

        logger.debug(`Incoming request: ${req.method} ${req.url}`, { trace_id: traceId });

        res.on('finish', () => {
            const meta = {
                trace_id: traceId,
                status: res.statusCode,
                duration_ms: Date.now() - startedAt
            };
            if (res.statusCode >= 500) {
                logger.error(`Completed ${req.method} ${req.url}`, meta);
            } else {
                logger.info(`Completed ${req.method} ${req.url}`, meta);
            }
        });

        next();
    });

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok', service: name, timestamp: new Date().toISOString() });
    });

    return app;
};

export const startService = (app: Express, port: number): Server => {
    return app.listen(port, () => {
        logger.info(`Service listening on port ${port}`);
    });
};
