import type { Response } from 'express';

import { InvariantViolationError, PeerUnavailableError } from '../../engine/errors.js';
import { isVirtual } from '../../engine/identity.js';
import type { CanonicalProfile, ProfileEntry, UserId } from '../../engine/types.js';
import { CardConflictError, UserLookupError } from '../../store/index.js';

export const toProfileResponse = (profile: CanonicalProfile) => {
  const response: Record<string, unknown> = {
    name: profile.name,
    game: profile.game,
    version: profile.version,
    refid: profile.refId,
    extid: profile.extId,
  };

  if (profile.area !== undefined) response.area = profile.area;
  if (profile.pid !== undefined) response.pid = profile.pid;
  if (profile.qpro !== undefined) response.qpro = { ...profile.qpro };
  if (profile.chara !== undefined) response.chara = profile.chara;
  if (profile.config !== undefined) response.config = { icon_id: profile.config.iconId };

  return response;
};

export const toIdentityResponse = (userId: UserId) => ({
  user_id: userId,
  virtual: isVirtual(userId),
});

export const toProfileEntryResponse = (entry: ProfileEntry) => ({
  ...toIdentityResponse(entry.userId),
  profile: entry.profile ? toProfileResponse(entry.profile) : null,
});

export const sendRouteError = (res: Response, err: unknown, context: string) => {
  if (err instanceof PeerUnavailableError) {
    console.warn(context, { peers: err.peers, message: err.message });
    return res.status(502).send({ error: 'peer_unavailable', message: err.message, peers: err.peers });
  }
  if (err instanceof UserLookupError) {
    return res.status(404).send({ error: 'user_not_found', message: err.message });
  }
  if (err instanceof CardConflictError) {
    return res.status(409).send({ error: 'card_conflict', message: err.message });
  }
  if (err instanceof InvariantViolationError) {
    console.error(context, err);
    return res.status(500).send({ error: 'invariant_violation' });
  }
  console.error(context, err);
  return res.status(500).send({ error: 'internal_error' });
};
