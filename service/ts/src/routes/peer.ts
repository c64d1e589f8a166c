import type { Express } from 'express';
import { z } from 'zod';

import { canonicalizeCard } from '../engine/identity.js';
import { toWireRecord } from '../engine/normalizer.js';
import type {
  CanonicalProfile,
  MatchQuality,
  PeerProfilesResponse,
  RawProfileRecord,
  UserId,
} from '../engine/types.js';
import type { ProfileStore } from '../store/index.js';
import { GameScopeParamsSchema } from './helpers/scope.js';
import { sendRouteError } from './helpers/responders.js';

const MAX_PEER_IDS = 1_000;

const PeerQuerySchema = z.object({
  type: z.enum(['card', 'server']),
  ids: z.array(z.string().min(1)).max(MAX_PEER_IDS).default([]),
});

export interface PeerRouteDeps {
  store: ProfileStore;
}

/**
 * Serves this server's own profiles to the rest of the federation. Only local
 * data is returned, never profiles learned from other peers.
 */
export const registerPeerRoutes = (app: Express, deps: PeerRouteDeps) => {
  const { store } = deps;

  const toPeerRecord = async (
    userId: UserId,
    profile: CanonicalProfile,
    match: MatchQuality
  ): Promise<RawProfileRecord> => ({
    ...toWireRecord(profile),
    cards: await store.getCardsForUser(userId),
    match,
  });

  app.post('/v1/peer/:game/:version/profiles', async (req, res) => {
    const params = GameScopeParamsSchema.safeParse(req.params);
    const body = PeerQuerySchema.safeParse(req.body);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!body.success) {
      return res.status(400).send({ error: 'validation_error', details: body.error.flatten() });
    }

    const { game, version } = params.data;
    try {
      const records: RawProfileRecord[] = [];

      if (body.data.type === 'server') {
        for (const entry of await store.getAllProfiles(game, version)) {
          if (!entry.profile) continue;
          records.push(await toPeerRecord(entry.userId, entry.profile, 'exact'));
        }
        const response: PeerProfilesResponse = { profiles: records };
        return res.send(response);
      }

      const answered = new Set<UserId>();
      for (const card of new Set(body.data.ids.map(canonicalizeCard))) {
        const userId = await store.fromCard(card);
        if (!userId || answered.has(userId)) continue;
        answered.add(userId);

        const exact = await store.getProfile(game, version, userId);
        if (exact) {
          records.push(await toPeerRecord(userId, exact, 'exact'));
          continue;
        }
        const partial = await store.getAnyProfile(game, version, userId);
        if (partial) {
          records.push(await toPeerRecord(userId, partial, 'partial'));
        }
      }

      const response: PeerProfilesResponse = { profiles: records };
      return res.send(response);
    } catch (err) {
      return sendRouteError(res, err, 'peer_profiles_error');
    }
  });
};
