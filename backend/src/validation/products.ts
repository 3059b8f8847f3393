/**
 * Product Validation Schemas
 */

import { z } from 'zod';
import { idParamSchema, tgIdSchema } from './common.js';

export const scanQrSchema = z.object({
    tg_id: tgIdSchema,
    qr_code: z.string().trim().min(1, 'QR code is required').max(64),
    first_name: z.string().max(64).nullish(),
    username: z.string().max(64).nullish(),
});

export const productParamsSchema = z.object({
    product_id: idParamSchema,
});

export const createProductSchema = z.object({
    name: z.string().trim().min(1).max(128),
    qr_code: z.string().trim().min(1).max(64),
    description: z.string().nullish(),
    image_url: z.string().max(512).nullish(),
});

export type ScanQrInput = z.infer<typeof scanQrSchema>;
export type CreateProductInput = z.infer<typeof createProductSchema>;
