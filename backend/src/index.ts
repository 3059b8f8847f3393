/**
 * Trainer Mini App API Server
 * 
 * Copyright (c) 2026 Rejourney
 * 
 * Licensed under the Server Side Public License 1.0 (the "License");
 * you may not use this file except in compliance with the License.
 * See LICENSE-SSPL for full terms.
 */

import { config } from './config.js';
import { logger } from './logger.js';
import { db, pool } from './db/client.js';
import { bootstrapSchema } from './db/bootstrap.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
    await bootstrapSchema(db);

    const app = createApp(db);

    const server = app.listen(config.PORT, () => {
        logger.info({ port: config.PORT, env: config.NODE_ENV }, 'Trainer API server started');
    });

    let isShuttingDown = false;

    async function shutdown(signal: string) {
        if (isShuttingDown) return;
        isShuttingDown = true;

        logger.info({ signal }, 'Shutting down gracefully...');
        server.close();
        await pool.end();
        logger.info('Shutdown complete');
        process.exit(0);
    }

    const onSignal = (signal: string) => {
        shutdown(signal).catch((err: unknown) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
        });
    };

    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
});
