/**
 * Routes Index
 * 
 * Register all API routes
 */

import { Router } from 'express';
import type { Database } from '../db/database.js';
import { createUserRoutes } from './users.js';
import { createProductRoutes } from './products.js';
import { createTrainingRoutes } from './training.js';
import { createSupportRoutes } from './support.js';
import { createAdminRoutes } from './admin.js';

export function createApiRouter(db: Database): Router {
    const router = Router();

    router.use('/', createUserRoutes(db)); // /api/user/:tg_id
    router.use('/', createProductRoutes(db)); // /api/scan-qr, /api/product/:product_id
    router.use('/', createTrainingRoutes(db)); // /api/training-programs, /api/training-videos
    router.use('/', createSupportRoutes(db)); // /api/support

    // Content management
    router.use('/admin', createAdminRoutes(db));

    return router;
}
