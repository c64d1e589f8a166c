import type { Express } from 'express';
import { z } from 'zod';

import type { ProfileReconciler } from '../engine/reconciler.js';
import { BooleanFlag, GameScopeParamsSchema, UserIdSchema, createRequestSignal } from './helpers/scope.js';
import { sendRouteError, toProfileEntryResponse, toProfileResponse } from './helpers/responders.js';

const MAX_LOOKUP_IDS = 500;

const ProfileParamsSchema = GameScopeParamsSchema.extend({
  userId: UserIdSchema,
});

const ProfileQuerySchema = z.object({
  strict: BooleanFlag.optional(),
});

const ProfileLookupSchema = z.object({
  user_ids: z.array(UserIdSchema).max(MAX_LOOKUP_IDS),
});

export interface ProfileRouteDeps {
  reconciler: ProfileReconciler;
}

export const registerProfileRoutes = (app: Express, deps: ProfileRouteDeps) => {
  const { reconciler } = deps;

  app.get('/v1/games/:game/:version/profiles', async (req, res) => {
    const parsed = GameScopeParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const { game, version } = parsed.data;
    try {
      const entries = await reconciler.getAllProfiles(game, version, { signal: createRequestSignal(res) });
      return res.send({ profiles: entries.map(toProfileEntryResponse) });
    } catch (err) {
      return sendRouteError(res, err, 'profiles_list_error');
    }
  });

  app.post('/v1/games/:game/:version/profiles/lookup', async (req, res) => {
    const params = GameScopeParamsSchema.safeParse(req.params);
    const body = ProfileLookupSchema.safeParse(req.body);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!body.success) {
      return res.status(400).send({ error: 'validation_error', details: body.error.flatten() });
    }

    const { game, version } = params.data;
    try {
      const entries = await reconciler.getAnyProfiles(game, version, body.data.user_ids, {
        signal: createRequestSignal(res),
      });
      return res.send({ profiles: entries.map(toProfileEntryResponse) });
    } catch (err) {
      return sendRouteError(res, err, 'profiles_lookup_error');
    }
  });

  app.get('/v1/games/:game/:version/profiles/:userId', async (req, res) => {
    const params = ProfileParamsSchema.safeParse(req.params);
    const query = ProfileQuerySchema.safeParse(req.query);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!query.success) {
      return res.status(400).send({ error: 'validation_error', details: query.error.flatten() });
    }

    const { game, version, userId } = params.data;
    const strict = query.data.strict ?? false;
    try {
      const signal = createRequestSignal(res);
      const profile = strict
        ? await reconciler.getProfile(game, version, userId, { signal })
        : await reconciler.getAnyProfile(game, version, userId, { signal });

      if (!profile) {
        return res.status(404).send({ error: 'profile_not_found', message: `No profile for ${userId}` });
      }
      return res.send(toProfileResponse(profile));
    } catch (err) {
      return sendRouteError(res, err, 'profile_get_error');
    }
  });
};
