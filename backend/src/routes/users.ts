/**
 * User Routes
 *
 * Main menu data: the caller and the products they have unlocked
 */

import { Router } from 'express';
import type { Database } from '../db/database.js';
import { asyncHandler } from '../middleware/index.js';
import { upsertUser, toUserView } from '../services/users.js';
import { listUserProducts } from '../services/products.js';
import { userParamsSchema } from '../validation/users.js';

export function createUserRoutes(db: Database): Router {
    const router = Router();

    /**
     * Get the user and their activated products
     * GET /api/user/:tg_id
     */
    router.get(
        '/user/:tg_id',
        asyncHandler(async (req, res) => {
            const { tg_id } = userParamsSchema.parse(req.params);

            const user = await upsertUser(db, tg_id);
            const products = await listUserProducts(db, user.id);

            res.json({
                user: toUserView(user),
                products,
            });
        })
    );

    return router;
}
