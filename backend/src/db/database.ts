import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type * as schema from './schema.js';

/**
 * Driver-agnostic Drizzle handle over the project schema.
 *
 * The server runs on node-postgres; tests hand in an in-process PGlite
 * instance. Services only ever see this type.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;
