import type { Express } from 'express';

export const registerHealthRoutes = (app: Express, options: { peerCount: number }) => {
  app.get('/health', (_req, res) => res.status(200).send({ ok: true, peers: options.peerCount }));
};
