import type { Express } from 'express';
import { z } from 'zod';

import type { ProfileReconciler } from '../engine/reconciler.js';
import { GameScopeParamsSchema } from './helpers/scope.js';
import { sendRouteError, toIdentityResponse } from './helpers/responders.js';

const CardParamsSchema = z.object({
  card: z.string().trim().min(1),
});

const RefIdParamsSchema = GameScopeParamsSchema.extend({
  refId: z.string().min(1),
});

const ExtIdParamsSchema = GameScopeParamsSchema.extend({
  extId: z.coerce.number().int().positive(),
});

export interface IdentityRouteDeps {
  reconciler: ProfileReconciler;
}

export const registerIdentityRoutes = (app: Express, deps: IdentityRouteDeps) => {
  const { reconciler } = deps;

  app.get('/v1/identities/cards/:card', async (req, res) => {
    const parsed = CardParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const userId = await reconciler.fromCard(parsed.data.card);
      return res.send(toIdentityResponse(userId));
    } catch (err) {
      return sendRouteError(res, err, 'identity_card_error');
    }
  });

  app.get('/v1/games/:game/:version/identities/refid/:refId', async (req, res) => {
    const parsed = RefIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const { game, version, refId } = parsed.data;
    try {
      const userId = await reconciler.fromRefId(game, version, refId);
      if (!userId) {
        return res.status(404).send({ error: 'identity_not_found', message: `Unknown refid ${refId}` });
      }
      return res.send(toIdentityResponse(userId));
    } catch (err) {
      return sendRouteError(res, err, 'identity_refid_error');
    }
  });

  app.get('/v1/games/:game/:version/identities/extid/:extId', async (req, res) => {
    const parsed = ExtIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const { game, version, extId } = parsed.data;
    try {
      const userId = await reconciler.fromExtId(game, version, extId);
      if (!userId) {
        return res.status(404).send({ error: 'identity_not_found', message: `Unknown extid ${extId}` });
      }
      return res.send(toIdentityResponse(userId));
    } catch (err) {
      return sendRouteError(res, err, 'identity_extid_error');
    }
  });
};
