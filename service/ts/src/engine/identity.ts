import { InvariantViolationError } from './errors.js';
import type { CardId, UserId } from './types.js';

// Local ids are UUIDs, so nothing the store allocates can carry this prefix.
const VIRTUAL_PREFIX = 'remote:';

export const canonicalizeCard = (card: string): CardId => card.trim().toUpperCase();

export const cardToVirtual = (card: CardId): UserId => `${VIRTUAL_PREFIX}${canonicalizeCard(card)}`;

export const isVirtual = (userId: UserId): boolean => userId.startsWith(VIRTUAL_PREFIX);

export const virtualToCard = (userId: UserId): CardId => {
  if (!isVirtual(userId)) {
    throw new InvariantViolationError(`Not a virtual identity: ${userId}`);
  }
  const card = canonicalizeCard(userId.slice(VIRTUAL_PREFIX.length));
  if (!card) {
    throw new InvariantViolationError(`Virtual identity without a card: ${userId}`);
  }
  return card;
};

/** Local ids pass through; virtual ids are rewritten around their canonical card. */
export const canonicalizeIdentity = (userId: UserId): UserId =>
  isVirtual(userId) ? cardToVirtual(virtualToCard(userId)) : userId;

/** False only for a virtual identity that carries no card. */
export const isWellFormedIdentity = (userId: UserId): boolean =>
  !isVirtual(userId) || canonicalizeCard(userId.slice(VIRTUAL_PREFIX.length)).length > 0;

export interface CardLookup {
  fromCard(card: CardId): Promise<UserId | null>;
}

/** Local identity for `card` when the store knows it, else the card's virtual identity. */
export const resolveCard = async (store: CardLookup, card: CardId): Promise<UserId> => {
  const canonical = canonicalizeCard(card);
  const userId = await store.fromCard(canonical);
  return userId ?? cardToVirtual(canonical);
};
