import { PeerClient } from '@federated-profiles/peer-client';

import type { ServiceConfig } from '../config.js';
import { RemoteProfileFetcher } from '../engine/fanout.js';
import { ProfileReconciler } from '../engine/reconciler.js';
import type { ProfilePeer } from '../engine/types.js';
import type { ProfileStore } from '../store/index.js';

export type FederationConfig = Pick<
  ServiceConfig,
  'peers' | 'peerTimeoutMs' | 'peerRetryAttempts' | 'peerFailurePolicy'
>;

export const createPeerClients = (config: FederationConfig): ProfilePeer[] =>
  config.peers.map(
    (peer) =>
      new PeerClient({
        name: peer.name,
        baseUrl: peer.url,
        token: peer.token,
        timeoutMs: config.peerTimeoutMs,
        retry: { attempts: config.peerRetryAttempts },
      })
  );

export const createReconciler = (
  store: ProfileStore,
  config: FederationConfig,
  peers: ProfilePeer[] = createPeerClients(config)
): ProfileReconciler =>
  new ProfileReconciler(store, new RemoteProfileFetcher(peers, { failurePolicy: config.peerFailurePolicy }));
