/**
 * Support Request Service
 */

import { desc, eq, sql } from 'drizzle-orm';
import type { Database } from '../db/database.js';
import {
    products,
    supportRequests,
    type SupportRequestRecord,
    type SupportStatus,
} from '../db/schema.js';
import { ApiError } from '../middleware/index.js';
import { createModuleLogger } from '../logger.js';

const log = createModuleLogger('support');

export interface SupportRequestView {
    id: number;
    message: string;
    status: SupportStatus;
    product_id: number | null;
    created_at: Date;
}

export function toSupportRequestView(request: SupportRequestRecord): SupportRequestView {
    return {
        id: request.id,
        message: request.message,
        status: request.status,
        product_id: request.productId,
        created_at: request.createdAt,
    };
}

/**
 * File a support request. Requests are never deduplicated.
 *
 * @throws ApiError.notFound when productId names no product
 */
export async function createSupportRequest(
    db: Database,
    userId: number,
    message: string,
    productId?: number | null
): Promise<SupportRequestRecord> {
    if (productId != null) {
        const [product] = await db
            .select({ id: products.id })
            .from(products)
            .where(eq(products.id, productId))
            .limit(1);

        if (!product) {
            throw ApiError.notFound('Product not found');
        }
    }

    const [request] = await db
        .insert(supportRequests)
        .values({ userId, message, productId: productId ?? null })
        .returning();

    log.info({ requestId: request.id, userId, productId: request.productId }, 'Support request filed');
    return request;
}

/**
 * A user's support requests, most recent first
 */
export async function listSupportRequests(db: Database, userId: number): Promise<SupportRequestView[]> {
    const rows = await db
        .select()
        .from(supportRequests)
        .where(eq(supportRequests.userId, userId))
        .orderBy(desc(supportRequests.createdAt), desc(supportRequests.id));

    return rows.map(toSupportRequestView);
}

export async function updateSupportRequestStatus(
    db: Database,
    requestId: number,
    status: SupportStatus
): Promise<SupportRequestRecord> {
    const [request] = await db
        .update(supportRequests)
        .set({ status, updatedAt: sql`now()` })
        .where(eq(supportRequests.id, requestId))
        .returning();

    if (!request) {
        throw ApiError.notFound('Support request not found');
    }

    log.info({ requestId, status }, 'Support request status changed');
    return request;
}
