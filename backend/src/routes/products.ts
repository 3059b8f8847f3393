/**
 * Product Routes
 *
 * QR scanning and product details
 */

import { Router } from 'express';
import type { Database } from '../db/database.js';
import { logger } from '../logger.js';
import { ApiError, asyncHandler } from '../middleware/index.js';
import { upsertUser } from '../services/users.js';
import { activateProduct, getActivatedProduct, toProductView } from '../services/products.js';
import { callerQuerySchema } from '../validation/common.js';
import { productParamsSchema, scanQrSchema } from '../validation/products.js';

export function createProductRoutes(db: Database): Router {
    const router = Router();

    /**
     * Scan a QR code and unlock its product
     * POST /api/scan-qr
     */
    router.post(
        '/scan-qr',
        asyncHandler(async (req, res) => {
            const body = scanQrSchema.parse(req.body);

            const user = await upsertUser(db, body.tg_id, body.first_name, body.username);
            const result = await activateProduct(db, user.id, body.qr_code);

            if (!result) {
                logger.info({ userId: user.id }, 'Unknown QR code scanned');
                throw ApiError.notFound('QR code not found');
            }

            res.json({
                status: 'success',
                already_activated: !result.activated,
                product: toProductView(result.product),
            });
        })
    );

    /**
     * Product details, for activated products only
     * GET /api/product/:product_id?tg_id=
     */
    router.get(
        '/product/:product_id',
        asyncHandler(async (req, res) => {
            const { product_id } = productParamsSchema.parse(req.params);
            const { tg_id } = callerQuerySchema.parse(req.query);

            const user = await upsertUser(db, tg_id);
            const product = await getActivatedProduct(db, user.id, product_id);

            res.json(product);
        })
    );

    return router;
}
