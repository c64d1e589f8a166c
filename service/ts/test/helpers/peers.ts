import { setTimeout as sleep } from 'node:timers/promises';

import type { PeerCallOptions } from '@federated-profiles/peer-client';

import type { CardId, Game, PeerIdType, ProfilePeer, RawProfileRecord } from '../../src/engine/types.js';

export interface RecordedPeerCall {
  game: Game;
  version: number;
  idType: PeerIdType;
  ids: CardId[];
  signal?: AbortSignal;
}

export interface FakePeerOptions {
  records?: RawProfileRecord[];
  error?: Error;
  delayMs?: number;
}

/** In-process stand-in for a remote server. */
export class FakePeer implements ProfilePeer {
  readonly calls: RecordedPeerCall[] = [];
  private records: RawProfileRecord[];
  private error?: Error;
  private delayMs: number;

  constructor(
    readonly name: string,
    options: FakePeerOptions = {}
  ) {
    this.records = options.records ?? [];
    this.error = options.error;
    this.delayMs = options.delayMs ?? 0;
  }

  respondWith(records: RawProfileRecord[]) {
    this.records = records;
    this.error = undefined;
  }

  failWith(error: Error) {
    this.error = error;
  }

  async getProfiles(
    game: Game,
    version: number,
    idType: PeerIdType,
    ids: CardId[],
    options: PeerCallOptions = {}
  ): Promise<RawProfileRecord[]> {
    this.calls.push({ game, version, idType, ids: [...ids], signal: options.signal });
    if (this.delayMs > 0) {
      await sleep(this.delayMs, undefined, { signal: options.signal });
    }
    if (this.error) {
      throw this.error;
    }
    return structuredClone(this.records);
  }
}

export const totalCalls = (peers: FakePeer[]) => peers.reduce((sum, peer) => sum + peer.calls.length, 0);
