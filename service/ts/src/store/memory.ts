import { randomUUID } from 'crypto';

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
import type { ProfileIdentifiers, ProfileStore, ProfileWriteInput } from './types.js';
import { CardConflictError, UserLookupError } from './types.js';
import {
  buildIdentifierKey,
  buildScopeKey,
  MAX_MINT_ATTEMPTS,
  mintExtId,
  mintRefId,
} from './helpers.js';

interface MemoryProfileRecord {
  game: Game;
  version: number;
  data: RawProfileRecord;
  updatedAt: Date;
}

interface MemoryUserRecord {
  userId: UserId;
  createdAt: Date;
  profiles: Map<string, MemoryProfileRecord>;
}

export class MemoryStore implements ProfileStore {
  private users = new Map<UserId, MemoryUserRecord>();
  private cards = new Map<CardId, UserId>();
  private identifiers = new Map<string, ProfileIdentifiers>();
  private refIds = new Map<string, UserId>();
  private extIds = new Map<string, UserId>();

  private now() {
    return new Date();
  }

  private ensureIdentifiers(game: Game, version: number, userId: UserId): ProfileIdentifiers {
    const key = buildIdentifierKey(game, version, userId);
    const existing = this.identifiers.get(key);
    if (existing) return existing;

    const scope = buildScopeKey(game, version);
    const refId = this.mintUnique(() => mintRefId(), (candidate) => this.refIds.has(`${scope}:${candidate}`));
    const extId = this.mintUnique(() => mintExtId(), (candidate) => this.extIds.has(`${scope}:${candidate}`));

    const identifiers = { refId, extId };
    this.identifiers.set(key, identifiers);
    this.refIds.set(`${scope}:${refId}`, userId);
    this.extIds.set(`${scope}:${extId}`, userId);
    return identifiers;
  }

  private mintUnique<T>(mint: () => T, taken: (candidate: T) => boolean): T {
    for (let attempt = 0; attempt < MAX_MINT_ATTEMPTS; attempt += 1) {
      const candidate = mint();
      if (!taken(candidate)) return candidate;
    }
    throw new Error('Unable to mint a unique profile identifier');
  }

  private requireUser(userId: UserId): MemoryUserRecord {
    const user = this.users.get(userId);
    if (!user) {
      throw new UserLookupError(`User not found: ${userId}`, userId);
    }
    return user;
  }

  private toProfile(userId: UserId, record: MemoryProfileRecord): CanonicalProfile {
    const { refId, extId } = this.ensureIdentifiers(record.game, record.version, userId);
    return normalizeProfile(record.data, record.game, record.version, refId, extId);
  }

  async getRefId(game: Game, version: number, userId: UserId): Promise<string> {
    return this.ensureIdentifiers(game, version, userId).refId;
  }

  async getExtId(game: Game, version: number, userId: UserId): Promise<number> {
    return this.ensureIdentifiers(game, version, userId).extId;
  }

  async getProfile(game: Game, version: number, userId: UserId): Promise<CanonicalProfile | null> {
    const record = this.users.get(userId)?.profiles.get(buildScopeKey(game, version));
    return record ? this.toProfile(userId, record) : null;
  }

  async getAnyProfile(game: Game, version: number, userId: UserId): Promise<CanonicalProfile | null> {
    const user = this.users.get(userId);
    if (!user) return null;

    const exact = user.profiles.get(buildScopeKey(game, version));
    if (exact) return this.toProfile(userId, exact);

    let fallback: MemoryProfileRecord | null = null;
    for (const record of user.profiles.values()) {
      if (record.game !== game) continue;
      if (!fallback || record.version > fallback.version) {
        fallback = record;
      }
    }
    return fallback ? this.toProfile(userId, fallback) : null;
  }

  async getAnyProfiles(game: Game, version: number, userIds: UserId[]): Promise<ProfileEntry[]> {
    const entries: ProfileEntry[] = [];
    for (const userId of userIds) {
      entries.push({ userId, profile: await this.getAnyProfile(game, version, userId) });
    }
    return entries;
  }

  async getAllCards(): Promise<CardEntry[]> {
    return [...this.cards.entries()].map(([card, userId]) => ({ card, userId }));
  }

  async getAllProfiles(game: Game, version: number): Promise<ProfileEntry[]> {
    const scope = buildScopeKey(game, version);
    const entries: ProfileEntry[] = [];
    for (const user of this.users.values()) {
      const record = user.profiles.get(scope);
      if (!record) continue;
      entries.push({ userId: user.userId, profile: this.toProfile(user.userId, record) });
    }
    return entries;
  }

  async fromCard(card: CardId): Promise<UserId | null> {
    return this.cards.get(canonicalizeCard(card)) ?? null;
  }

  async fromRefId(game: Game, version: number, refId: string): Promise<UserId | null> {
    return this.refIds.get(`${buildScopeKey(game, version)}:${refId}`) ?? null;
  }

  async fromExtId(game: Game, version: number, extId: number): Promise<UserId | null> {
    return this.extIds.get(`${buildScopeKey(game, version)}:${extId}`) ?? null;
  }

  async createUser(): Promise<UserId> {
    const userId = randomUUID();
    this.users.set(userId, { userId, createdAt: this.now(), profiles: new Map() });
    return userId;
  }

  async addCard(userId: UserId, card: CardId): Promise<void> {
    this.requireUser(userId);
    const canonical = canonicalizeCard(card);
    const owner = this.cards.get(canonical);
    if (owner && owner !== userId) {
      throw new CardConflictError(`Card ${canonical} already belongs to another user`, canonical, owner);
    }
    this.cards.set(canonical, userId);
  }

  async getCardsForUser(userId: UserId): Promise<CardId[]> {
    return [...this.cards.entries()].filter(([, owner]) => owner === userId).map(([card]) => card);
  }

  async putProfile(input: ProfileWriteInput): Promise<void> {
    const user = this.requireUser(input.userId);
    user.profiles.set(buildScopeKey(input.game, input.version), {
      game: input.game,
      version: input.version,
      data: structuredClone(input.data),
      updatedAt: this.now(),
    });
  }
}
