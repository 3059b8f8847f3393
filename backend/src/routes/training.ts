/**
 * Training Content Routes
 */

import { Router } from 'express';
import type { Database } from '../db/database.js';
import { ApiError, asyncHandler } from '../middleware/index.js';
import { upsertUser } from '../services/users.js';
import { getActivatedProduct } from '../services/products.js';
import { findProgram, listProgramVideos, listPrograms } from '../services/training.js';
import { callerQuerySchema } from '../validation/common.js';
import { productParamsSchema } from '../validation/products.js';
import { programParamsSchema } from '../validation/training.js';

export function createTrainingRoutes(db: Database): Router {
    const router = Router();

    /**
     * Programs of an activated product, videos embedded
     * GET /api/training-programs/:product_id?tg_id=
     */
    router.get(
        '/training-programs/:product_id',
        asyncHandler(async (req, res) => {
            const { product_id } = productParamsSchema.parse(req.params);
            const { tg_id } = callerQuerySchema.parse(req.query);

            const user = await upsertUser(db, tg_id);
            await getActivatedProduct(db, user.id, product_id);

            const programs = await listPrograms(db, product_id);

            res.json({
                product_id,
                programs,
            });
        })
    );

    /**
     * Videos of a program whose product the caller has activated
     * GET /api/training-videos/:program_id?tg_id=
     */
    router.get(
        '/training-videos/:program_id',
        asyncHandler(async (req, res) => {
            const { program_id } = programParamsSchema.parse(req.params);
            const { tg_id } = callerQuerySchema.parse(req.query);

            const user = await upsertUser(db, tg_id);

            const program = await findProgram(db, program_id);
            if (!program) {
                throw ApiError.notFound('Training program not found');
            }

            await getActivatedProduct(db, user.id, program.productId);

            const videos = await listProgramVideos(db, program_id);

            res.json({
                program_id,
                videos,
            });
        })
    );

    return router;
}
