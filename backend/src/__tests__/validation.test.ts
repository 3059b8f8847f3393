import { describe, expect, it } from 'vitest';
import { PG_INT_MAX, idParamSchema, idSchema, tgIdParamSchema } from '../validation/common.js';
import { createProgramSchema, createVideoSchema } from '../validation/training.js';

describe('idParamSchema', () => {
    it('parses plain decimal digits', () => {
        expect(idParamSchema.parse('17')).toBe(17);
    });

    it('rejects exponent, hex and signed forms', () => {
        expect(idParamSchema.safeParse('1e3').success).toBe(false);
        expect(idParamSchema.safeParse('0x10').success).toBe(false);
        expect(idParamSchema.safeParse('-5').success).toBe(false);
        expect(idParamSchema.safeParse(' 5').success).toBe(false);
    });

    it('rejects zero and values beyond the integer column range', () => {
        expect(idParamSchema.safeParse('0').success).toBe(false);
        expect(idParamSchema.parse(String(PG_INT_MAX))).toBe(PG_INT_MAX);
        expect(idParamSchema.safeParse('3000000000').success).toBe(false);
    });
});

describe('idSchema', () => {
    it('caps body ids at the integer column range', () => {
        expect(idSchema.safeParse(PG_INT_MAX + 1).success).toBe(false);
    });
});

describe('tgIdParamSchema', () => {
    it('accepts external ids wider than 32 bits', () => {
        expect(tgIdParamSchema.parse('5000000000')).toBe(5_000_000_000);
    });

    it('rejects exponent notation', () => {
        expect(tgIdParamSchema.safeParse('1e3').success).toBe(false);
    });
});

describe('createProgramSchema', () => {
    it('defaults order_index to 0 and accepts negative positions', () => {
        expect(createProgramSchema.parse({ product_id: 1, title: 'Warm-up' }).order_index).toBe(0);
        expect(createProgramSchema.parse({ product_id: 1, title: 'Warm-up', order_index: -1 }).order_index).toBe(-1);
    });

    it('rejects an order_index outside the integer column range', () => {
        const result = createProgramSchema.safeParse({ product_id: 1, title: 'Warm-up', order_index: 3_000_000_000 });

        expect(result.success).toBe(false);
        expect(result.error?.issues[0].path).toEqual(['order_index']);
    });
});

describe('createVideoSchema', () => {
    it('rejects a duration outside the integer column range', () => {
        const result = createVideoSchema.safeParse({
            program_id: 1,
            title: 'Squats',
            video_url: 'https://video.example/squats',
            duration_seconds: 3_000_000_000,
        });

        expect(result.success).toBe(false);
        expect(result.error?.issues[0].path).toEqual(['duration_seconds']);
    });
});
