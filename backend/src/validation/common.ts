/**
 * Shared Validation Primitives
 */

import { z } from 'zod';

/** Range of a PostgreSQL `integer` column */
export const PG_INT_MIN = -2_147_483_648;
export const PG_INT_MAX = 2_147_483_647;

/** Positive integer id carried in a JSON body */
export const idSchema = z.number().int().positive().max(PG_INT_MAX);

/** Position within a list; any `integer` column value */
export const orderIndexSchema = z.number().int().min(PG_INT_MIN).max(PG_INT_MAX);

// Path and query values must be plain decimal digits; `1e3` or `0x10` are rejected
const digitsSchema = z.string().regex(/^\d+$/, 'Expected a decimal number');

/** Positive integer id carried in a path or query string */
export const idParamSchema = digitsSchema.transform(Number).pipe(idSchema);

/** External (messaging platform) user id */
export const tgIdSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

export const tgIdParamSchema = digitsSchema.transform(Number).pipe(tgIdSchema);

/** Query string `?tg_id=` identifying the caller */
export const callerQuerySchema = z.object({
    tg_id: tgIdParamSchema,
});
