import { randomUUID } from 'crypto';
import { and, asc, desc, eq, inArray } from 'drizzle-orm';

import { getDb } from '../db/client.js';
import { cards, profileIdentifiers, profiles, users } from '../db/schema.js';
import { canonicalizeCard } from '../engine/identity.js';
import { normalizeProfile } from '../engine/normalizer.js';
import type {
  CanonicalProfile,
  CardEntry,
  CardId,
  Game,
  ProfileEntry,
  RawProfileRecord,
  UserId,
} from '../engine/types.js';
import { createPostgresContext, type PostgresStoreContext } from './postgres/context.js';
import type { ProfileStore, ProfileWriteInput } from './types.js';
import { CardConflictError } from './types.js';

interface ProfileRow {
  userId: UserId;
  version: number;
  data: RawProfileRecord;
}

export class PostgresStore implements ProfileStore {
  private readonly ctx: PostgresStoreContext;

  constructor(private readonly db = getDb()) {
    this.ctx = createPostgresContext(this.db);
  }

  private async toProfile(game: Game, row: ProfileRow): Promise<CanonicalProfile> {
    const { refId, extId } = await this.ctx.ensureIdentifiers(game, row.version, row.userId);
    return normalizeProfile(row.data, game, row.version, refId, extId);
  }

  private async selectGameRows(game: Game, userIds: UserId[]): Promise<ProfileRow[]> {
    if (!userIds.length) return [];
    return this.db
      .select({ userId: profiles.userId, version: profiles.version, data: profiles.data })
      .from(profiles)
      .where(and(eq(profiles.game, game), inArray(profiles.userId, userIds)))
      .orderBy(desc(profiles.version));
  }

  // Rows arrive highest version first, so the first row per user is the fallback.
  private pickAnyRow(rows: ProfileRow[], userId: UserId, version: number): ProfileRow | null {
    const own = rows.filter((row) => row.userId === userId);
    return own.find((row) => row.version === version) ?? own.at(0) ?? null;
  }

  async getRefId(game: Game, version: number, userId: UserId): Promise<string> {
    return (await this.ctx.ensureIdentifiers(game, version, userId)).refId;
  }

  async getExtId(game: Game, version: number, userId: UserId): Promise<number> {
    return (await this.ctx.ensureIdentifiers(game, version, userId)).extId;
  }

  async getProfile(game: Game, version: number, userId: UserId): Promise<CanonicalProfile | null> {
    const rows = await this.db
      .select({ userId: profiles.userId, version: profiles.version, data: profiles.data })
      .from(profiles)
      .where(and(eq(profiles.userId, userId), eq(profiles.game, game), eq(profiles.version, version)))
      .limit(1);

    const row = rows.at(0);
    return row ? this.toProfile(game, row) : null;
  }

  async getAnyProfile(game: Game, version: number, userId: UserId): Promise<CanonicalProfile | null> {
    const rows = await this.selectGameRows(game, [userId]);
    const row = this.pickAnyRow(rows, userId, version);
    return row ? this.toProfile(game, row) : null;
  }

  async getAnyProfiles(game: Game, version: number, userIds: UserId[]): Promise<ProfileEntry[]> {
    const rows = await this.selectGameRows(game, [...new Set(userIds)]);

    const entries: ProfileEntry[] = [];
    for (const userId of userIds) {
      const row = this.pickAnyRow(rows, userId, version);
      entries.push({ userId, profile: row ? await this.toProfile(game, row) : null });
    }
    return entries;
  }

  async getAllCards(): Promise<CardEntry[]> {
    return this.db
      .select({ card: cards.cardId, userId: cards.userId })
      .from(cards)
      .orderBy(asc(cards.createdAt), asc(cards.cardId));
  }

  async getAllProfiles(game: Game, version: number): Promise<ProfileEntry[]> {
    const rows = await this.db
      .select({ userId: profiles.userId, version: profiles.version, data: profiles.data })
      .from(profiles)
      .where(and(eq(profiles.game, game), eq(profiles.version, version)))
      .orderBy(asc(profiles.createdAt), asc(profiles.userId));

    const entries: ProfileEntry[] = [];
    for (const row of rows) {
      entries.push({ userId: row.userId, profile: await this.toProfile(game, row) });
    }
    return entries;
  }

  async fromCard(card: CardId): Promise<UserId | null> {
    const rows = await this.db
      .select({ userId: cards.userId })
      .from(cards)
      .where(eq(cards.cardId, canonicalizeCard(card)))
      .limit(1);
    return rows.at(0)?.userId ?? null;
  }

  async fromRefId(game: Game, version: number, refId: string): Promise<UserId | null> {
    const rows = await this.db
      .select({ userId: profileIdentifiers.userId })
      .from(profileIdentifiers)
      .where(
        and(
          eq(profileIdentifiers.game, game),
          eq(profileIdentifiers.version, version),
          eq(profileIdentifiers.refId, refId)
        )
      )
      .limit(1);
    return rows.at(0)?.userId ?? null;
  }

  async fromExtId(game: Game, version: number, extId: number): Promise<UserId | null> {
    const rows = await this.db
      .select({ userId: profileIdentifiers.userId })
      .from(profileIdentifiers)
      .where(
        and(
          eq(profileIdentifiers.game, game),
          eq(profileIdentifiers.version, version),
          eq(profileIdentifiers.extId, extId)
        )
      )
      .limit(1);
    return rows.at(0)?.userId ?? null;
  }

  async createUser(): Promise<UserId> {
    const userId = randomUUID();
    await this.db.insert(users).values({ userId, createdAt: this.ctx.now() });
    return userId;
  }

  async addCard(userId: UserId, card: CardId): Promise<void> {
    await this.ctx.assertUserExists(userId);
    const canonical = canonicalizeCard(card);

    await this.db
      .insert(cards)
      .values({ cardId: canonical, userId, createdAt: this.ctx.now() })
      .onConflictDoNothing({ target: cards.cardId });

    const owner = await this.fromCard(canonical);
    if (owner && owner !== userId) {
      throw new CardConflictError(`Card ${canonical} already belongs to another user`, canonical, owner);
    }
  }

  async getCardsForUser(userId: UserId): Promise<CardId[]> {
    const rows = await this.db
      .select({ card: cards.cardId })
      .from(cards)
      .where(eq(cards.userId, userId))
      .orderBy(asc(cards.createdAt), asc(cards.cardId));
    return rows.map((row) => row.card);
  }

  async putProfile(input: ProfileWriteInput): Promise<void> {
    await this.ctx.assertUserExists(input.userId);
    const nowTs = this.ctx.now();

    await this.db
      .insert(profiles)
      .values({
        userId: input.userId,
        game: input.game,
        version: input.version,
        data: input.data,
        createdAt: nowTs,
        updatedAt: nowTs,
      })
      .onConflictDoUpdate({
        target: [profiles.userId, profiles.game, profiles.version],
        set: {
          data: input.data,
          updatedAt: nowTs,
        },
      });
  }
}
