import { z } from 'zod';

import type { ProfileStore } from '../store/types.js';
import type { RemoteProfileFetcher } from './fanout.js';
import {
  canonicalizeCard,
  canonicalizeIdentity,
  cardToVirtual,
  isVirtual,
  resolveCard,
  virtualToCard,
} from './identity.js';
import { normalizeProfile } from './normalizer.js';
import type {
  CanonicalProfile,
  CardId,
  Game,
  MatchQuality,
  ProfileEntry,
  RawProfileRecord,
  UserId,
} from './types.js';
import { UNKNOWN_VERSION } from './types.js';

const RemoteEnvelopeSchema = z.object({
  cards: z.array(z.unknown()).catch([]),
  match: z.enum(['exact', 'partial']).catch('partial'),
});

interface RemoteEnvelope {
  cards: CardId[];
  match: MatchQuality;
  payload: RawProfileRecord;
}

/**
 * Splits a peer record into its federation envelope and a detached copy of
 * the profile payload without `cards` and `match`.
 */
const openEnvelope = (record: RawProfileRecord): RemoteEnvelope => {
  const envelope = RemoteEnvelopeSchema.parse(record);
  const payload: RawProfileRecord = {};
  for (const [key, value] of Object.entries(structuredClone(record))) {
    if (key === 'cards' || key === 'match') continue;
    payload[key] = value;
  }

  return {
    cards: envelope.cards
      .filter((card): card is string => typeof card === 'string')
      .map(canonicalizeCard),
    match: envelope.match,
    payload,
  };
};

export interface ProfileRequestOptions {
  signal?: AbortSignal;
}

/**
 * Answers profile questions from local data and the peer federation.
 * Card-only users get a virtual identity derived from their card.
 */
export class ProfileReconciler {
  constructor(
    private readonly store: ProfileStore,
    private readonly remote: RemoteProfileFetcher
  ) {}

  fromCard(card: CardId): Promise<UserId> {
    return resolveCard(this.store, card);
  }

  fromRefId(game: Game, version: number, refId: string): Promise<UserId | null> {
    return this.store.fromRefId(game, version, refId);
  }

  fromExtId(game: Game, version: number, extId: number): Promise<UserId | null> {
    return this.store.fromExtId(game, version, extId);
  }

  /** Profile for exactly `game`/`version`. */
  getProfile(
    game: Game,
    version: number,
    userId: UserId,
    options: ProfileRequestOptions = {}
  ): Promise<CanonicalProfile | null> {
    return this.getOne(game, version, userId, true, options);
  }

  /** Profile for `game`/`version`, or for the same game at another version. */
  getAnyProfile(
    game: Game,
    version: number,
    userId: UserId,
    options: ProfileRequestOptions = {}
  ): Promise<CanonicalProfile | null> {
    return this.getOne(game, version, userId, false, options);
  }

  async getOne(
    game: Game,
    version: number,
    userId: UserId,
    strict: boolean,
    options: ProfileRequestOptions = {}
  ): Promise<CanonicalProfile | null> {
    if (!isVirtual(userId)) {
      return strict
        ? this.store.getProfile(game, version, userId)
        : this.store.getAnyProfile(game, version, userId);
    }

    const card = virtualToCard(userId);
    const virtualId = cardToVirtual(card);
    const refId = await this.store.getRefId(game, version, virtualId);
    const extId = await this.store.getExtId(game, version, virtualId);

    const records = await this.remote.fetchByCards(game, version, [card], options.signal);
    for (const record of records) {
      const envelope = openEnvelope(record);
      if (!envelope.cards.includes(card)) continue;

      const exact = envelope.match === 'exact';
      if (strict && !exact) continue;

      return normalizeProfile(envelope.payload, game, exact ? version : UNKNOWN_VERSION, refId, extId);
    }

    return null;
  }

  /**
   * Profiles for a mix of local and virtual identities. Every virtual
   * identity is answered, with `profile: null` when no peer knows its card.
   * Virtual identities come back in canonical form.
   */
  async getAnyProfiles(
    game: Game,
    version: number,
    userIds: UserId[],
    options: ProfileRequestOptions = {}
  ): Promise<ProfileEntry[]> {
    if (!userIds.length) return [];

    const localIds = userIds.filter((userId) => !isVirtual(userId));
    const virtualIds = userIds.filter(isVirtual).map(canonicalizeIdentity);

    if (!virtualIds.length) {
      return this.store.getAnyProfiles(game, version, localIds);
    }

    const remaining = new Map<CardId, UserId>(virtualIds.map((userId) => [virtualToCard(userId), userId]));

    const [localEntries, records] = await Promise.all([
      this.store.getAnyProfiles(game, version, localIds),
      this.remote.fetchByCards(game, version, [...remaining.keys()], options.signal),
    ]);

    const entries: ProfileEntry[] = [...localEntries];
    for (const record of records) {
      const envelope = openEnvelope(record);
      const exact = envelope.match === 'exact';

      for (const card of envelope.cards) {
        const userId = remaining.get(card);
        if (userId === undefined) continue;
        remaining.delete(card);

        const refId = await this.store.getRefId(game, version, userId);
        const extId = await this.store.getExtId(game, version, userId);
        entries.push({
          userId,
          profile: normalizeProfile(envelope.payload, game, exact ? version : UNKNOWN_VERSION, refId, extId),
        });
      }
    }

    for (const userId of remaining.values()) {
      entries.push({ userId, profile: null });
    }

    return entries;
  }

  /**
   * Every local profile for `game`/`version`, plus exact remote profiles for
   * cards this server has never seen.
   */
  async getAllProfiles(
    game: Game,
    version: number,
    options: ProfileRequestOptions = {}
  ): Promise<ProfileEntry[]> {
    const [localCards, localEntries, records] = await Promise.all([
      this.store.getAllCards(),
      this.store.getAllProfiles(game, version),
      this.remote.fetchAll(game, version, options.signal),
    ]);

    const knownCards = new Set(localCards.map((entry) => canonicalizeCard(entry.card)));
    const profilesById = new Map<UserId, CanonicalProfile | null>(
      localEntries.map((entry) => [entry.userId, entry.profile])
    );

    for (const record of records) {
      const envelope = openEnvelope(record);
      const cards = [...envelope.cards].sort();
      const firstCard = cards.at(0);
      if (firstCard === undefined) continue;

      // Local data wins for any card this server already owns.
      if (cards.some((card) => knownCards.has(card))) continue;
      if (envelope.match !== 'exact') continue;

      const userId = cardToVirtual(firstCard);
      const refId = await this.store.getRefId(game, version, userId);
      const extId = await this.store.getExtId(game, version, userId);
      profilesById.set(userId, normalizeProfile(envelope.payload, game, version, refId, extId));
    }

    return [...profilesById.entries()].map(([userId, profile]) => ({ userId, profile }));
  }
}
