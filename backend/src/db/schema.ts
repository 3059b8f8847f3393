/**
 * Drizzle ORM Database Schema
 *
 * Column names are snake_case in the database; the DDL issued at startup
 * lives in bootstrap.ts and must stay in step with these tables.
 */

import {
    pgTable,
    serial,
    varchar,
    text,
    integer,
    bigint,
    timestamp,
    uniqueIndex,
    index,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

// =============================================================================
// Users & Products
// =============================================================================

export const users = pgTable('users', {
    id: serial('id').primaryKey(),
    // External (messaging platform) id supplied by the caller
    tgId: bigint('tg_id', { mode: 'number' }).unique().notNull(),
    firstName: varchar('first_name', { length: 64 }),
    username: varchar('username', { length: 64 }),
    createdAt: timestamp('created_at').defaultNow().notNull(),
});

export const products = pgTable('products', {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 128 }).notNull(),
    description: text('description'),
    qrCode: varchar('qr_code', { length: 64 }).unique().notNull(),
    imageUrl: varchar('image_url', { length: 512 }),
    createdAt: timestamp('created_at').defaultNow().notNull(),
});

/**
 * Activation record: written the first time a user scans a product's QR code.
 */
export const userProducts = pgTable(
    'user_products',
    {
        id: serial('id').primaryKey(),
        userId: integer('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
        productId: integer('product_id').notNull().references(() => products.id, { onDelete: 'cascade' }),
        activatedAt: timestamp('activated_at').defaultNow().notNull(),
    },
    (table) => [
        uniqueIndex('user_products_user_product_unique').on(table.userId, table.productId),
    ]
);

// =============================================================================
// Training Content
// =============================================================================

export const trainingPrograms = pgTable(
    'training_programs',
    {
        id: serial('id').primaryKey(),
        productId: integer('product_id').notNull().references(() => products.id, { onDelete: 'cascade' }),
        title: varchar('title', { length: 128 }).notNull(),
        description: text('description'),
        orderIndex: integer('order_index').default(0).notNull(),
    },
    (table) => [
        index('training_programs_product_idx').on(table.productId, table.orderIndex),
    ]
);

export const trainingVideos = pgTable(
    'training_videos',
    {
        id: serial('id').primaryKey(),
        programId: integer('program_id').notNull().references(() => trainingPrograms.id, { onDelete: 'cascade' }),
        title: varchar('title', { length: 128 }).notNull(),
        videoUrl: varchar('video_url', { length: 512 }).notNull(), // external link, never hosted here
        description: text('description'),
        orderIndex: integer('order_index').default(0).notNull(),
        durationSeconds: integer('duration_seconds'),
    },
    (table) => [
        index('training_videos_program_idx').on(table.programId, table.orderIndex),
    ]
);

// =============================================================================
// Support
// =============================================================================

export const SUPPORT_STATUSES = ['new', 'in_progress', 'resolved'] as const;
export type SupportStatus = (typeof SUPPORT_STATUSES)[number];

export const supportRequests = pgTable(
    'support_requests',
    {
        id: serial('id').primaryKey(),
        userId: integer('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
        productId: integer('product_id').references(() => products.id, { onDelete: 'cascade' }),
        message: text('message').notNull(),
        status: varchar('status', { length: 32, enum: SUPPORT_STATUSES }).default('new').notNull(),
        createdAt: timestamp('created_at').defaultNow().notNull(),
        updatedAt: timestamp('updated_at').defaultNow().notNull(),
    },
    (table) => [
        index('support_requests_user_idx').on(table.userId, table.createdAt),
    ]
);

// =============================================================================
// Relations
// =============================================================================

export const usersRelations = relations(users, ({ many }) => ({
    userProducts: many(userProducts),
    supportRequests: many(supportRequests),
}));

export const productsRelations = relations(products, ({ many }) => ({
    userProducts: many(userProducts),
    trainingPrograms: many(trainingPrograms),
}));

export const userProductsRelations = relations(userProducts, ({ one }) => ({
    user: one(users, { fields: [userProducts.userId], references: [users.id] }),
    product: one(products, { fields: [userProducts.productId], references: [products.id] }),
}));

export const trainingProgramsRelations = relations(trainingPrograms, ({ one, many }) => ({
    product: one(products, { fields: [trainingPrograms.productId], references: [products.id] }),
    videos: many(trainingVideos),
}));

export const trainingVideosRelations = relations(trainingVideos, ({ one }) => ({
    program: one(trainingPrograms, { fields: [trainingVideos.programId], references: [trainingPrograms.id] }),
}));

export const supportRequestsRelations = relations(supportRequests, ({ one }) => ({
    user: one(users, { fields: [supportRequests.userId], references: [users.id] }),
    product: one(products, { fields: [supportRequests.productId], references: [products.id] }),
}));

export type UserRecord = typeof users.$inferSelect;
export type ProductRecord = typeof products.$inferSelect;
export type TrainingProgramRecord = typeof trainingPrograms.$inferSelect;
export type TrainingVideoRecord = typeof trainingVideos.$inferSelect;
export type SupportRequestRecord = typeof supportRequests.$inferSelect;
