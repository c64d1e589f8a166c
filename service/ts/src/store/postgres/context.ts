import { and, eq } from 'drizzle-orm';

import { getDb } from '../../db/client.js';
import { profileIdentifiers, users } from '../../db/schema.js';
import type { Game, UserId } from '../../engine/types.js';
import { UserLookupError } from '../types.js';
import type { ProfileIdentifiers } from '../types.js';
import { MAX_MINT_ATTEMPTS, mintExtId, mintRefId } from '../helpers.js';

export type DbClient = ReturnType<typeof getDb>;

export interface PostgresStoreContext {
  db: DbClient;
  now: () => Date;
  assertUserExists: (userId: UserId) => Promise<void>;
  ensureIdentifiers: (game: Game, version: number, userId: UserId) => Promise<ProfileIdentifiers>;
}

const now = () => new Date();

const isUniqueViolation = (err: unknown) =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';

const createAssertUserExists = (db: DbClient) =>
  async (userId: UserId) => {
    const rows = await db
      .select({ userId: users.userId })
      .from(users)
      .where(eq(users.userId, userId))
      .limit(1);

    if (!rows.length) {
      throw new UserLookupError(`User not found: ${userId}`, userId);
    }
  };

const createEnsureIdentifiers = (db: DbClient, nowFn: () => Date) => {
  const findIdentifiers = async (game: Game, version: number, userId: UserId) => {
    const rows = await db
      .select({ refId: profileIdentifiers.refId, extId: profileIdentifiers.extId })
      .from(profileIdentifiers)
      .where(
        and(
          eq(profileIdentifiers.game, game),
          eq(profileIdentifiers.version, version),
          eq(profileIdentifiers.userId, userId)
        )
      )
      .limit(1);
    return rows.at(0) ?? null;
  };

  return async (game: Game, version: number, userId: UserId): Promise<ProfileIdentifiers> => {
    const existing = await findIdentifiers(game, version, userId);
    if (existing) return existing;

    for (let attempt = 0; attempt < MAX_MINT_ATTEMPTS; attempt += 1) {
      try {
        const inserted = await db
          .insert(profileIdentifiers)
          .values({
            game,
            version,
            userId,
            refId: mintRefId(),
            extId: mintExtId(),
            createdAt: nowFn(),
          })
          .onConflictDoNothing({
            target: [profileIdentifiers.game, profileIdentifiers.version, profileIdentifiers.userId],
          })
          .returning({ refId: profileIdentifiers.refId, extId: profileIdentifiers.extId });

        const row = inserted.at(0) ?? (await findIdentifiers(game, version, userId));
        if (row) return row;
      } catch (err) {
        // ref/ext id collision with another identity; mint again
        if (!isUniqueViolation(err)) throw err;
      }
    }

    throw new Error(`Unable to mint profile identifiers for ${userId} (${game}/${version})`);
  };
};

export const createPostgresContext = (db: DbClient): PostgresStoreContext => {
  const nowFn = now;

  return {
    db,
    now: nowFn,
    assertUserExists: createAssertUserExists(db),
    ensureIdentifiers: createEnsureIdentifiers(db, nowFn),
  } satisfies PostgresStoreContext;
};
