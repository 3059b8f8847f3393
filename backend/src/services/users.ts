/**
 * User Service
 *
 * Users are never registered explicitly: every identity-bearing request
 * upserts the caller by external id.
 */

import { sql } from 'drizzle-orm';
import type { Database } from '../db/database.js';
import { users, type UserRecord } from '../db/schema.js';
import { createModuleLogger } from '../logger.js';

const log = createModuleLogger('users');

export interface UserView {
    id: number;
    tg_id: number;
    first_name: string | null;
    username: string | null;
}

export function toUserView(user: UserRecord): UserView {
    return {
        id: user.id,
        tg_id: user.tgId,
        first_name: user.firstName,
        username: user.username,
    };
}

/**
 * Insert the user or return the existing row for this external id.
 *
 * A stored name or handle is only overwritten by a non-empty value. The
 * whole operation is one INSERT ... ON CONFLICT statement, so concurrent
 * first contacts for the same id both resolve to the same row.
 */
export async function upsertUser(
    db: Database,
    tgId: number,
    firstName?: string | null,
    username?: string | null
): Promise<UserRecord> {
    const [user] = await db
        .insert(users)
        .values({
            tgId,
            firstName: firstName || null,
            username: username || null,
        })
        .onConflictDoUpdate({
            target: users.tgId,
            set: {
                firstName: sql`coalesce(excluded.first_name, ${users.firstName})`,
                username: sql`coalesce(excluded.username, ${users.username})`,
            },
        })
        .returning();

    log.debug({ userId: user.id, tgId }, 'User upserted');
    return user;
}
