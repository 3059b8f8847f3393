/**
 * Training Content Validation Schemas
 */

import { z } from 'zod';
import { PG_INT_MAX, idParamSchema, idSchema, orderIndexSchema } from './common.js';

export const programParamsSchema = z.object({
    program_id: idParamSchema,
});

export const createProgramSchema = z.object({
    product_id: idSchema,
    title: z.string().trim().min(1).max(128),
    description: z.string().nullish(),
    order_index: orderIndexSchema.optional().default(0),
});

export const createVideoSchema = z.object({
    program_id: idSchema,
    title: z.string().trim().min(1).max(128),
    video_url: z.string().url().max(512),
    description: z.string().nullish(),
    order_index: orderIndexSchema.optional().default(0),
    duration_seconds: z.number().int().min(0).max(PG_INT_MAX).nullish(),
});

export type CreateProgramInput = z.infer<typeof createProgramSchema>;
export type CreateVideoInput = z.infer<typeof createVideoSchema>;
