import type { Response } from 'express';
import { z } from 'zod';

import { isWellFormedIdentity } from '../../engine/identity.js';
import { GAMES } from '../../engine/types.js';

export const GameEnum = z.enum(GAMES);

export const GameScopeParamsSchema = z.object({
  game: GameEnum,
  version: z.coerce.number().int().min(1),
});

export const UserIdSchema = z
  .string()
  .min(1)
  .refine(isWellFormedIdentity, { message: 'virtual identity must carry a card' });

export const BooleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

/**
 * Aborts when the client goes away before the response is written, so peer
 * requests made on its behalf are cancelled.
 */
export const createRequestSignal = (res: Response): AbortSignal => {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort(new Error('client_disconnected'));
    }
  });
  return controller.signal;
};
