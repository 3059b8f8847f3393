/**
 * Support Routes
 */

import { Router } from 'express';
import type { Database } from '../db/database.js';
import { asyncHandler } from '../middleware/index.js';
import { upsertUser } from '../services/users.js';
import { createSupportRequest, listSupportRequests } from '../services/support.js';
import { userParamsSchema } from '../validation/users.js';
import { createSupportRequestSchema } from '../validation/support.js';

export const SUPPORT_ACK_MESSAGE =
    'Your request has been received. A consultant will contact you shortly.';

export function createSupportRoutes(db: Database): Router {
    const router = Router();

    /**
     * File a support request
     * POST /api/support
     */
    router.post(
        '/support',
        asyncHandler(async (req, res) => {
            const body = createSupportRequestSchema.parse(req.body);

            const user = await upsertUser(db, body.tg_id);
            const request = await createSupportRequest(db, user.id, body.message, body.product_id);

            res.status(201).json({
                status: 'success',
                request_id: request.id,
                message: SUPPORT_ACK_MESSAGE,
            });
        })
    );

    /**
     * Support history of a user
     * GET /api/support/:tg_id
     */
    router.get(
        '/support/:tg_id',
        asyncHandler(async (req, res) => {
            const { tg_id } = userParamsSchema.parse(req.params);

            const user = await upsertUser(db, tg_id);
            const requests = await listSupportRequests(db, user.id);

            res.json({ requests });
        })
    );

    return router;
}
