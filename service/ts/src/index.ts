import dotenv from 'dotenv';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createPeerClients, createReconciler } from './services/federation.js';
import { getStore } from './store/index.js';

dotenv.config();

const config = loadConfig();
const store = getStore();
const peers = createPeerClients(config);
const reconciler = createReconciler(store, config, peers);
const app = createApp({ store, reconciler, peerCount: peers.length });

export { app };

if (process.env.NODE_ENV !== 'test') {
  app.listen(config.port, () =>
    console.log('profiles_listening', { port: config.port, peers: peers.map((peer) => peer.name) })
  );
}
