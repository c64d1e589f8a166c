import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import type { ProfileReconciler } from './engine/reconciler.js';
import type { ProfileStore } from './store/index.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerIdentityRoutes } from './routes/identities.js';
import { registerProfileRoutes } from './routes/profiles.js';
import { registerPeerRoutes } from './routes/peer.js';

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const payload = serializeError(err);
  if (payload.log) {
    // eslint-disable-next-line no-console
    console.error(payload.log.context, payload.log.error);
  }

  res.status(payload.status).json(payload.body);
};

const isBodyParseError = (err: unknown): err is SyntaxError & { status: number } =>
  err instanceof SyntaxError && 'status' in err && err.status === 400;

const serializeError = (err: unknown): {
  status: number;
  body: Record<string, unknown>;
  log?: { error: unknown; context: string };
} => {
  if (isBodyParseError(err)) {
    return { status: 400, body: { error: 'invalid_json', message: err.message } };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: { error: err, context: 'unhandled_error' },
  };
};

export interface AppDeps {
  store: ProfileStore;
  reconciler: ProfileReconciler;
  peerCount: number;
}

export const createApp = ({ store, reconciler, peerCount }: AppDeps): Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  registerHealthRoutes(app, { peerCount });
  registerIdentityRoutes(app, { reconciler });
  registerProfileRoutes(app, { reconciler });
  registerPeerRoutes(app, { store });

  app.use(errorHandler);

  return app;
};
