/**
 * Drizzle ORM Database Client
 */

import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { config, isDevelopment } from '../config.js';
import { createModuleLogger } from '../logger.js';
import * as schema from './schema.js';
import type { Database } from './database.js';

const { Pool } = pg;

const log = createModuleLogger('db');

// Create PostgreSQL connection pool
const pool = new Pool({
    connectionString: config.DATABASE_URL,
    max: config.DATABASE_POOL_MAX,
    application_name: 'trainer-api', // shows up in pg_stat_activity
    idleTimeoutMillis: 30000, // Close idle connections after 30 seconds
    connectionTimeoutMillis: 2000, // Return an error if connection takes longer than 2 seconds
});

pool.on('error', (err) => {
    log.error({ err }, 'Unexpected error on idle database client');
});

export const db: Database = drizzle({
    client: pool,
    schema,
    logger: isDevelopment ? {
        logQuery: (query: string, params: unknown[]) => {
            log.debug({ query, params }, 'Database query');
        },
    } : undefined,
});

// Exported for health checks and shutdown
export { pool };

export * from './schema.js';
