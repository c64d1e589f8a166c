import type { CanonicalProfile, CardEntry, CardId, Game, ProfileEntry, UserId } from '../../engine/types.js';
import type { ProfileWriteInput } from './profiles.js';

/**
 * Profiles owned by this server. Reference and external ids are minted on
 * first request for any identity, local or virtual.
 */
export interface ProfileStore {
  getRefId(game: Game, version: number, userId: UserId): Promise<string>;
  getExtId(game: Game, version: number, userId: UserId): Promise<number>;
  getProfile(game: Game, version: number, userId: UserId): Promise<CanonicalProfile | null>;
  /** Exact version when stored, else the highest other version of the same game. */
  getAnyProfile(game: Game, version: number, userId: UserId): Promise<CanonicalProfile | null>;
  getAnyProfiles(game: Game, version: number, userIds: UserId[]): Promise<ProfileEntry[]>;
  getAllCards(): Promise<CardEntry[]>;
  getAllProfiles(game: Game, version: number): Promise<ProfileEntry[]>;
  fromCard(card: CardId): Promise<UserId | null>;
  fromRefId(game: Game, version: number, refId: string): Promise<UserId | null>;
  fromExtId(game: Game, version: number, extId: number): Promise<UserId | null>;
  createUser(): Promise<UserId>;
  addCard(userId: UserId, card: CardId): Promise<void>;
  getCardsForUser(userId: UserId): Promise<CardId[]>;
  putProfile(input: ProfileWriteInput): Promise<void>;
}
