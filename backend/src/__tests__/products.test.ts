import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { count } from 'drizzle-orm';
import { userProducts } from '../db/schema.js';
import { ApiError } from '../middleware/index.js';
import { upsertUser } from '../services/users.js';
import {
    activateProduct,
    createProduct,
    getActivatedProduct,
    listProducts,
    listUserProducts,
} from '../services/products.js';
import { createTestDatabase, resetDatabase, type TestDatabase } from './helpers/testDb.js';

describe('Product Service', () => {
    let testDb: TestDatabase;

    beforeAll(async () => {
        testDb = await createTestDatabase();
    });

    afterAll(async () => {
        await testDb.close();
    });

    beforeEach(async () => {
        await resetDatabase(testDb.db);
    });

    async function countActivations(): Promise<number> {
        const [{ total }] = await testDb.db.select({ total: count() }).from(userProducts);
        return total;
    }

    describe('activateProduct', () => {
        it('activates a product once and treats a repeat scan as a no-op', async () => {
            const product = await createProduct(testDb.db, { name: 'Resistance Bands', qrCode: 'ABC123' });
            const user = await upsertUser(testDb.db, 42);

            const first = await activateProduct(testDb.db, user.id, 'ABC123');
            const second = await activateProduct(testDb.db, user.id, 'ABC123');

            expect(first?.product.id).toBe(product.id);
            expect(first?.activated).toBe(true);
            expect(second?.product.id).toBe(product.id);
            expect(second?.activated).toBe(false);
            expect(await countActivations()).toBe(1);
        });

        it('returns null for an unknown code and writes nothing', async () => {
            const user = await upsertUser(testDb.db, 42);

            const result = await activateProduct(testDb.db, user.id, 'NOPE');

            expect(result).toBeNull();
            expect(await countActivations()).toBe(0);
        });

        it('lets different users activate the same product', async () => {
            await createProduct(testDb.db, { name: 'Kettlebell', qrCode: 'KB-1' });
            const anna = await upsertUser(testDb.db, 1);
            const boris = await upsertUser(testDb.db, 2);

            await activateProduct(testDb.db, anna.id, 'KB-1');
            const result = await activateProduct(testDb.db, boris.id, 'KB-1');

            expect(result?.activated).toBe(true);
            expect(await countActivations()).toBe(2);
        });
    });

    describe('listUserProducts', () => {
        it('returns exactly the products the user activated, in activation order', async () => {
            await createProduct(testDb.db, { name: 'Mat', qrCode: 'MAT', description: 'Yoga mat' });
            await createProduct(testDb.db, { name: 'Rope', qrCode: 'ROPE', imageUrl: 'https://img.example/rope.png' });
            await createProduct(testDb.db, { name: 'Ball', qrCode: 'BALL' });
            const anna = await upsertUser(testDb.db, 1);
            const boris = await upsertUser(testDb.db, 2);

            await activateProduct(testDb.db, anna.id, 'ROPE');
            await activateProduct(testDb.db, boris.id, 'BALL');
            await activateProduct(testDb.db, anna.id, 'MAT');

            const products = await listUserProducts(testDb.db, anna.id);

            expect(products).toEqual([
                { id: 2, name: 'Rope', description: null, image_url: 'https://img.example/rope.png' },
                { id: 1, name: 'Mat', description: 'Yoga mat', image_url: null },
            ]);
        });

        it('returns an empty list for a user without activations', async () => {
            const user = await upsertUser(testDb.db, 1);

            expect(await listUserProducts(testDb.db, user.id)).toEqual([]);
        });
    });

    describe('getActivatedProduct', () => {
        it('returns the view of an activated product', async () => {
            const product = await createProduct(testDb.db, { name: 'Mat', qrCode: 'MAT' });
            const user = await upsertUser(testDb.db, 1);
            await activateProduct(testDb.db, user.id, 'MAT');

            const view = await getActivatedProduct(testDb.db, user.id, product.id);

            expect(view).toEqual({ id: product.id, name: 'Mat', description: null, image_url: null });
        });

        it('rejects a product the user has not activated', async () => {
            const product = await createProduct(testDb.db, { name: 'Mat', qrCode: 'MAT' });
            const user = await upsertUser(testDb.db, 1);

            const error = await getActivatedProduct(testDb.db, user.id, product.id).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ApiError);
            expect(error).toMatchObject({ statusCode: 403, message: 'No access to this product' });
        });
    });

    describe('createProduct', () => {
        it('rejects a QR code that is already assigned', async () => {
            await createProduct(testDb.db, { name: 'Mat', qrCode: 'DUP' });

            await expect(createProduct(testDb.db, { name: 'Rope', qrCode: 'DUP' }))
                .rejects.toMatchObject({ statusCode: 409, code: 'CONFLICT' });
        });

        it('lists products with their QR codes', async () => {
            await createProduct(testDb.db, { name: 'Mat', qrCode: 'MAT' });

            const products = await listProducts(testDb.db);

            expect(products).toHaveLength(1);
            expect(products[0]).toMatchObject({ id: 1, name: 'Mat', qr_code: 'MAT' });
        });
    });
});
