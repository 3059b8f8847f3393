/**
 * Database Seed Script
 *
 * Creates the schema and a demo product with two training programs so the
 * mini app has something to unlock locally. Safe to run repeatedly: the demo
 * product is only inserted when its QR code is unused.
 *
 * Usage: npm run db:seed
 */

import { sql } from 'drizzle-orm';
import { db, pool } from '../src/db/client.js';
import { bootstrapSchema } from '../src/db/bootstrap.js';
import { logger } from '../src/logger.js';
import { createProduct, findProductByQr } from '../src/services/products.js';
import { createProgram, createVideo } from '../src/services/training.js';

const DEMO_QR_CODE = 'DEMO-QR-001';

async function main() {
    await db.execute(sql`SELECT 1`);
    logger.info('Database connection verified');

    await bootstrapSchema(db);

    const existing = await findProductByQr(db, DEMO_QR_CODE);
    if (existing) {
        logger.info({ productId: existing.id }, 'Demo product already present, nothing to seed');
        return;
    }

    const product = await createProduct(db, {
        name: 'Resistance Band Set',
        qrCode: DEMO_QR_CODE,
        description: 'Five bands of increasing resistance',
    });

    const warmUp = await createProgram(db, {
        productId: product.id,
        title: 'Warm-up',
        description: 'Ten minutes before every session',
        orderIndex: 0,
    });
    await createVideo(db, {
        programId: warmUp.id,
        title: 'Shoulder circles',
        videoUrl: 'https://video.example/warm-up/shoulders',
        orderIndex: 0,
        durationSeconds: 180,
    });
    await createVideo(db, {
        programId: warmUp.id,
        title: 'Hip openers',
        videoUrl: 'https://video.example/warm-up/hips',
        orderIndex: 1,
        durationSeconds: 240,
    });

    const fullBody = await createProgram(db, {
        productId: product.id,
        title: 'Full body',
        orderIndex: 1,
    });
    await createVideo(db, {
        programId: fullBody.id,
        title: 'Banded squats',
        videoUrl: 'https://video.example/full-body/squats',
        orderIndex: 0,
        durationSeconds: 420,
    });

    logger.info({ productId: product.id, qrCode: DEMO_QR_CODE }, 'Demo content seeded');
}

main()
    .catch((err: unknown) => {
        logger.error({ err }, 'Seeding failed');
        process.exitCode = 1;
    })
    .finally(() => pool.end());
