/**
 * User Validation Schemas
 */

import { z } from 'zod';
import { tgIdParamSchema } from './common.js';

export const userParamsSchema = z.object({
    tg_id: tgIdParamSchema,
});
