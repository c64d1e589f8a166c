import type {
  MatchQuality,
  PeerCallOptions,
  PeerIdType,
  PeerProfilesResponse,
  RawProfileRecord,
} from '@federated-profiles/peer-client';

export type { MatchQuality, PeerIdType, PeerProfilesResponse, RawProfileRecord };

export const GAMES = ['ddr', 'iidx', 'jubeat', 'museca', 'pnm', 'reflec', 'sdvx'] as const;

export type Game = (typeof GAMES)[number];

/** Version reported for a remote profile that only partially matched. */
export const UNKNOWN_VERSION = 0;

export type CardId = string;
export type UserId = string;

export interface QproSelection {
  head?: number;
  hair?: number;
  face?: number;
  body?: number;
  hand?: number;
}

export interface GameSpecificFields {
  area?: number;
  pid?: number;
  qpro?: QproSelection;
  chara?: number;
  config?: { iconId: number };
}

export interface CanonicalProfile extends GameSpecificFields {
  name: string;
  game: Game;
  version: number;
  refId: string;
  extId: number;
}

export interface ProfileEntry {
  userId: UserId;
  profile: CanonicalProfile | null;
}

export interface CardEntry {
  card: CardId;
  userId: UserId;
}

/**
 * One remote server in the federation. `PeerClient` from the peer-client
 * package satisfies this; tests use in-process fakes.
 */
export interface ProfilePeer {
  readonly name: string;
  getProfiles(
    game: Game,
    version: number,
    idType: PeerIdType,
    ids: CardId[],
    options?: PeerCallOptions
  ): Promise<RawProfileRecord[]>;
}

export type PeerFailurePolicy = 'degrade' | 'propagate';
