/**
 * Schema bootstrap
 *
 * Creates the tables on startup when they are absent. There is no migration
 * history: every statement is idempotent and mirrors schema.ts.
 */

import { sql } from 'drizzle-orm';
import type { Database } from './database.js';
import { createModuleLogger } from '../logger.js';

const log = createModuleLogger('db');

// One statement per entry: PGlite's extended protocol rejects multi-statement strings.
const STATEMENTS = [
    sql`CREATE TABLE IF NOT EXISTS users (
        id serial PRIMARY KEY,
        tg_id bigint NOT NULL UNIQUE,
        first_name varchar(64),
        username varchar(64),
        created_at timestamp NOT NULL DEFAULT now()
    )`,
    sql`CREATE TABLE IF NOT EXISTS products (
        id serial PRIMARY KEY,
        name varchar(128) NOT NULL,
        description text,
        qr_code varchar(64) NOT NULL UNIQUE,
        image_url varchar(512),
        created_at timestamp NOT NULL DEFAULT now()
    )`,
    sql`CREATE TABLE IF NOT EXISTS user_products (
        id serial PRIMARY KEY,
        user_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        product_id integer NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        activated_at timestamp NOT NULL DEFAULT now()
    )`,
    sql`CREATE UNIQUE INDEX IF NOT EXISTS user_products_user_product_unique
        ON user_products (user_id, product_id)`,
    sql`CREATE TABLE IF NOT EXISTS training_programs (
        id serial PRIMARY KEY,
        product_id integer NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        title varchar(128) NOT NULL,
        description text,
        order_index integer NOT NULL DEFAULT 0
    )`,
    sql`CREATE INDEX IF NOT EXISTS training_programs_product_idx
        ON training_programs (product_id, order_index)`,
    sql`CREATE TABLE IF NOT EXISTS training_videos (
        id serial PRIMARY KEY,
        program_id integer NOT NULL REFERENCES training_programs(id) ON DELETE CASCADE,
        title varchar(128) NOT NULL,
        video_url varchar(512) NOT NULL,
        description text,
        order_index integer NOT NULL DEFAULT 0,
        duration_seconds integer
    )`,
    sql`CREATE INDEX IF NOT EXISTS training_videos_program_idx
        ON training_videos (program_id, order_index)`,
    sql`CREATE TABLE IF NOT EXISTS support_requests (
        id serial PRIMARY KEY,
        user_id integer NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        product_id integer REFERENCES products(id) ON DELETE CASCADE,
        message text NOT NULL,
        status varchar(32) NOT NULL DEFAULT 'new',
        created_at timestamp NOT NULL DEFAULT now(),
        updated_at timestamp NOT NULL DEFAULT now()
    )`,
    sql`CREATE INDEX IF NOT EXISTS support_requests_user_idx
        ON support_requests (user_id, created_at)`,
];

export async function bootstrapSchema(db: Database): Promise<void> {
    for (const statement of STATEMENTS) {
        await db.execute(statement);
    }
    log.debug({ statements: STATEMENTS.length }, 'Database schema ensured');
}
