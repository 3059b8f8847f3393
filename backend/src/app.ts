/**
 * Express application factory
 *
 * Built around an injected database handle so the same app runs against
 * node-postgres in production and an in-process database in tests.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';
import { sql } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';

import type { Database } from './db/database.js';
import { logger } from './logger.js';
import { createApiRouter } from './routes/index.js';
import { errorHandler, notFoundHandler } from './middleware/index.js';

const HEALTH_PATHS = new Set(['/health', '/health/ready']);

export function createApp(db: Database): express.Express {
    const app = express();

    app.set('trust proxy', 1);
    app.disable('x-powered-by');

    app.use(helmet());

    // The mini app is served from arbitrary hosts: reflect any origin
    app.use(cors({
        origin: true,
        credentials: true,
    }));

    app.use(express.json({ limit: '100kb' }));

    app.use((req, res, next) => {
        const incoming = req.headers['x-request-id'];
        const requestId = typeof incoming === 'string' && incoming ? incoming : uuidv4();
        req.headers['x-request-id'] = requestId;
        res.setHeader('X-Request-ID', requestId);
        next();
    });

    app.use(pinoHttp({
        logger,
        genReqId: (req: IncomingMessage) => {
            const id = req.headers['x-request-id'];
            return typeof id === 'string' ? id : uuidv4();
        },
        customLogLevel: (_req: IncomingMessage, res: ServerResponse, error?: Error) => {
            if (error || res.statusCode >= 500) return 'error';
            if (res.statusCode >= 400) return 'warn';
            return 'info';
        },
        customSuccessMessage: (req: IncomingMessage, res: ServerResponse) => {
            return `${req.method} ${req.url} ${res.statusCode}`;
        },
        customErrorMessage: (req: IncomingMessage, res: ServerResponse) => {
            return `${req.method} ${req.url} ${res.statusCode}`;
        },
        autoLogging: {
            ignore: (req: IncomingMessage) => HEALTH_PATHS.has(req.url ?? ''),
        },
    }));

    app.get('/', (_req, res) => {
        res.json({ message: 'Trainer Mini App API' });
    });

    // =========================================================================
    // Health Check Endpoints
    // =========================================================================

    /**
     * Liveness probe
     */
    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    /**
     * Readiness probe - the database must answer
     */
    app.get('/health/ready', async (_req, res) => {
        try {
            await db.execute(sql`SELECT 1`);
            res.json({
                status: 'ready',
                checks: { database: true },
                timestamp: new Date().toISOString(),
            });
        } catch (error) {
            logger.warn({ error }, 'Database health check failed');
            res.status(503).json({
                status: 'degraded',
                checks: { database: false },
                timestamp: new Date().toISOString(),
            });
        }
    });

    app.use('/api', createApiRouter(db));
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
