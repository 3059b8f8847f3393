import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { createProduct } from '../services/products.js';
import { upsertUser } from '../services/users.js';
import {
    createSupportRequest,
    listSupportRequests,
    updateSupportRequestStatus,
} from '../services/support.js';
import { createTestDatabase, resetDatabase, type TestDatabase } from './helpers/testDb.js';

describe('Support Service', () => {
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

    it('files requests with status new and lists the newest first', async () => {
        const user = await upsertUser(testDb.db, 42);
        const product = await createProduct(testDb.db, { name: 'Mat', qrCode: 'MAT' });

        const first = await createSupportRequest(testDb.db, user.id, 'Where is the manual?');
        const second = await createSupportRequest(testDb.db, user.id, 'The mat is torn', product.id);

        expect(first.status).toBe('new');
        expect(second.productId).toBe(product.id);

        const requests = await listSupportRequests(testDb.db, user.id);

        expect(requests.map((r) => r.id)).toEqual([second.id, first.id]);
        expect(requests[0]).toMatchObject({
            message: 'The mat is torn',
            status: 'new',
            product_id: product.id,
        });
        expect(requests[1].product_id).toBeNull();
    });

    it('does not deduplicate identical messages', async () => {
        const user = await upsertUser(testDb.db, 42);

        await createSupportRequest(testDb.db, user.id, 'Help');
        await createSupportRequest(testDb.db, user.id, 'Help');

        expect(await listSupportRequests(testDb.db, user.id)).toHaveLength(2);
    });

    it('keeps requests of other users out of the list', async () => {
        const anna = await upsertUser(testDb.db, 1);
        const boris = await upsertUser(testDb.db, 2);
        await createSupportRequest(testDb.db, boris.id, 'Help');

        expect(await listSupportRequests(testDb.db, anna.id)).toEqual([]);
    });

    it('rejects an unknown product', async () => {
        const user = await upsertUser(testDb.db, 42);

        await expect(createSupportRequest(testDb.db, user.id, 'Help', 999))
            .rejects.toMatchObject({ statusCode: 404, message: 'Product not found' });
    });

    it('moves a request through its statuses', async () => {
        const user = await upsertUser(testDb.db, 42);
        const request = await createSupportRequest(testDb.db, user.id, 'Help');

        const inProgress = await updateSupportRequestStatus(testDb.db, request.id, 'in_progress');
        const resolved = await updateSupportRequestStatus(testDb.db, request.id, 'resolved');

        expect(inProgress.status).toBe('in_progress');
        expect(resolved.status).toBe('resolved');
    });

    it('rejects a status change for an unknown request', async () => {
        await expect(updateSupportRequestStatus(testDb.db, 999, 'resolved'))
            .rejects.toMatchObject({ statusCode: 404 });
    });
});
