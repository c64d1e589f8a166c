import type { Game, RawProfileRecord, UserId } from '../../engine/types.js';

export interface ProfileScope {
  game: Game;
  version: number;
}

export interface ProfileIdentifiers {
  refId: string;
  extId: number;
}

export interface ProfileWriteInput extends ProfileScope {
  userId: UserId;
  data: RawProfileRecord;
}
