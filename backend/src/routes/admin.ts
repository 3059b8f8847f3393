/**
 * Admin Routes
 *
 * Content management. These endpoints carry no authentication and are
 * expected to be reachable from trusted networks only.
 */

import { Router } from 'express';
import type { Database } from '../db/database.js';
import { asyncHandler } from '../middleware/index.js';
import { createProduct, listProducts } from '../services/products.js';
import { createProgram, createVideo } from '../services/training.js';
import { toSupportRequestView, updateSupportRequestStatus } from '../services/support.js';
import { createProductSchema } from '../validation/products.js';
import { createProgramSchema, createVideoSchema } from '../validation/training.js';
import { supportRequestParamsSchema, updateSupportStatusSchema } from '../validation/support.js';

export function createAdminRoutes(db: Database): Router {
    const router = Router();

    /**
     * POST /api/admin/product
     */
    router.post(
        '/product',
        asyncHandler(async (req, res) => {
            const body = createProductSchema.parse(req.body);

            const product = await createProduct(db, {
                name: body.name,
                qrCode: body.qr_code,
                description: body.description,
                imageUrl: body.image_url,
            });

            res.status(201).json({ status: 'success', product_id: product.id });
        })
    );

    /**
     * GET /api/admin/products
     */
    router.get(
        '/products',
        asyncHandler(async (_req, res) => {
            const products = await listProducts(db);
            res.json({ products });
        })
    );

    /**
     * POST /api/admin/training-program
     */
    router.post(
        '/training-program',
        asyncHandler(async (req, res) => {
            const body = createProgramSchema.parse(req.body);

            const program = await createProgram(db, {
                productId: body.product_id,
                title: body.title,
                description: body.description,
                orderIndex: body.order_index,
            });

            res.status(201).json({ status: 'success', program_id: program.id });
        })
    );

    /**
     * POST /api/admin/training-video
     */
    router.post(
        '/training-video',
        asyncHandler(async (req, res) => {
            const body = createVideoSchema.parse(req.body);

            const video = await createVideo(db, {
                programId: body.program_id,
                title: body.title,
                videoUrl: body.video_url,
                description: body.description,
                orderIndex: body.order_index,
                durationSeconds: body.duration_seconds,
            });

            res.status(201).json({ status: 'success', video_id: video.id });
        })
    );

    /**
     * Move a support request through new -> in_progress -> resolved
     * PATCH /api/admin/support/:request_id
     */
    router.patch(
        '/support/:request_id',
        asyncHandler(async (req, res) => {
            const { request_id } = supportRequestParamsSchema.parse(req.params);
            const { status } = updateSupportStatusSchema.parse(req.body);

            const request = await updateSupportRequestStatus(db, request_id, status);

            res.json({ status: 'success', request: toSupportRequestView(request) });
        })
    );

    return router;
}
