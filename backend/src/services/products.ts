/**
 * Product Service
 *
 * QR activation and the per-user access checks built on it.
 */

import { and, asc, eq } from 'drizzle-orm';
import type { Database } from '../db/database.js';
import { products, userProducts, type ProductRecord } from '../db/schema.js';
import { ApiError } from '../middleware/index.js';
import { createModuleLogger } from '../logger.js';

const log = createModuleLogger('products');

export interface ProductView {
    id: number;
    name: string;
    description: string | null;
    image_url: string | null;
}

export interface AdminProductView extends ProductView {
    qr_code: string;
    created_at: Date;
}

export interface ActivationResult {
    product: ProductRecord;
    /** false when the user had already activated this product */
    activated: boolean;
}

export interface NewProduct {
    name: string;
    qrCode: string;
    description?: string | null;
    imageUrl?: string | null;
}

export function toProductView(product: Pick<ProductRecord, 'id' | 'name' | 'description' | 'imageUrl'>): ProductView {
    return {
        id: product.id,
        name: product.name,
        description: product.description,
        image_url: product.imageUrl,
    };
}

const productViewColumns = {
    id: products.id,
    name: products.name,
    description: products.description,
    imageUrl: products.imageUrl,
};

export async function findProductByQr(db: Database, qrCode: string): Promise<ProductRecord | undefined> {
    const [product] = await db
        .select()
        .from(products)
        .where(eq(products.qrCode, qrCode))
        .limit(1);

    return product;
}

/**
 * Activate the product behind a QR code for a user.
 *
 * Returns null for an unknown code. Scanning an already activated product
 * returns it again without writing a second activation row; the unique
 * (user_id, product_id) index turns a concurrent duplicate into a no-op.
 */
export async function activateProduct(
    db: Database,
    userId: number,
    qrCode: string
): Promise<ActivationResult | null> {
    const product = await findProductByQr(db, qrCode);
    if (!product) {
        return null;
    }

    const inserted = await db
        .insert(userProducts)
        .values({ userId, productId: product.id })
        .onConflictDoNothing({ target: [userProducts.userId, userProducts.productId] })
        .returning({ id: userProducts.id });

    const activated = inserted.length > 0;
    if (activated) {
        log.info({ userId, productId: product.id }, 'Product activated');
    }

    return { product, activated };
}

/**
 * Products the user has activated, in activation order
 */
export async function listUserProducts(db: Database, userId: number): Promise<ProductView[]> {
    const rows = await db
        .select(productViewColumns)
        .from(userProducts)
        .innerJoin(products, eq(userProducts.productId, products.id))
        .where(eq(userProducts.userId, userId))
        .orderBy(asc(userProducts.activatedAt), asc(userProducts.id));

    return rows.map(toProductView);
}

/**
 * @throws ApiError.forbidden when the product is not in the user's activated set
 */
export async function getActivatedProduct(
    db: Database,
    userId: number,
    productId: number
): Promise<ProductView> {
    const [row] = await db
        .select(productViewColumns)
        .from(userProducts)
        .innerJoin(products, eq(userProducts.productId, products.id))
        .where(and(eq(userProducts.userId, userId), eq(userProducts.productId, productId)))
        .limit(1);

    if (!row) {
        throw ApiError.forbidden('No access to this product');
    }

    return toProductView(row);
}

export async function createProduct(db: Database, input: NewProduct): Promise<ProductRecord> {
    const [product] = await db
        .insert(products)
        .values({
            name: input.name,
            qrCode: input.qrCode,
            description: input.description ?? null,
            imageUrl: input.imageUrl ?? null,
        })
        .onConflictDoNothing({ target: products.qrCode })
        .returning();

    if (!product) {
        throw ApiError.conflict('QR code is already assigned to another product', { qr_code: input.qrCode });
    }

    log.info({ productId: product.id }, 'Product created');
    return product;
}

export async function listProducts(db: Database): Promise<AdminProductView[]> {
    const rows = await db.select().from(products).orderBy(asc(products.id));

    return rows.map((product) => ({
        ...toProductView(product),
        qr_code: product.qrCode,
        created_at: product.createdAt,
    }));
}
