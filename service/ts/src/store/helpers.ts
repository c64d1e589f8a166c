import { randomBytes, randomInt } from 'crypto';

import type { Game, UserId } from '../engine/types.js';

const EXT_ID_MIN = 10_000_000;
const EXT_ID_MAX = 100_000_000;

export const buildScopeKey = (game: Game, version: number) => `${game}:${version}`;

export const buildIdentifierKey = (game: Game, version: number, userId: UserId) =>
  `${buildScopeKey(game, version)}:${userId}`;

export const mintRefId = () => randomBytes(8).toString('hex').toUpperCase();

export const mintExtId = () => randomInt(EXT_ID_MIN, EXT_ID_MAX);

export const MAX_MINT_ATTEMPTS = 16;
