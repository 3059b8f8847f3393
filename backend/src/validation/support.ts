/**
 * Support Request Validation Schemas
 */

import { z } from 'zod';
import { SUPPORT_STATUSES } from '../db/schema.js';
import { idParamSchema, idSchema, tgIdSchema } from './common.js';

export const createSupportRequestSchema = z.object({
    tg_id: tgIdSchema,
    message: z.string().trim().min(1, 'Message is required').max(4000),
    product_id: idSchema.nullish(),
});

export const supportRequestParamsSchema = z.object({
    request_id: idParamSchema,
});

export const updateSupportStatusSchema = z.object({
    status: z.enum(SUPPORT_STATUSES),
});

export type CreateSupportRequestInput = z.infer<typeof createSupportRequestSchema>;
