import { PeerUnavailableError, type PeerFailure } from './errors.js';
import type {
  CardId,
  Game,
  PeerFailurePolicy,
  PeerIdType,
  ProfilePeer,
  RawProfileRecord,
} from './types.js';

export interface RemoteProfileFetcherOptions {
  failurePolicy?: PeerFailurePolicy;
}

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Queries every configured peer at once and flattens the answers in peer
 * configuration order. Nothing is returned until every call has settled.
 */
export class RemoteProfileFetcher {
  readonly failurePolicy: PeerFailurePolicy;

  constructor(
    private readonly peers: readonly ProfilePeer[],
    options: RemoteProfileFetcherOptions = {}
  ) {
    this.failurePolicy = options.failurePolicy ?? 'degrade';
  }

  fetchByCards(game: Game, version: number, cards: CardId[], signal?: AbortSignal): Promise<RawProfileRecord[]> {
    return this.fanOut(game, version, 'card', cards, signal);
  }

  fetchAll(game: Game, version: number, signal?: AbortSignal): Promise<RawProfileRecord[]> {
    return this.fanOut(game, version, 'server', [], signal);
  }

  private async fanOut(
    game: Game,
    version: number,
    idType: PeerIdType,
    ids: CardId[],
    signal?: AbortSignal
  ): Promise<RawProfileRecord[]> {
    if (this.peers.length === 0) return [];

    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const propagate = this.failurePolicy === 'propagate';
    // Peers that failed on their own, as opposed to being cancelled by us or the caller.
    const failed = new Map<number, unknown>();

    let settled: PromiseSettledResult<RawProfileRecord[]>[];
    try {
      settled = await Promise.allSettled(
        this.peers.map(async (peer, index) => {
          try {
            return await peer.getProfiles(game, version, idType, [...ids], { signal: controller.signal });
          } catch (err) {
            if (!controller.signal.aborted) {
              failed.set(index, err);
              if (propagate) controller.abort(err);
            }
            throw err;
          }
        })
      );
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    // An abandoned request has no answer to give, empty or otherwise.
    signal?.throwIfAborted();

    const records: RawProfileRecord[] = [];
    const failures: PeerFailure[] = [];

    settled.forEach((result, index) => {
      const peer = this.peers[index];
      if (!peer) return;
      if (result.status === 'fulfilled') {
        records.push(...result.value);
        return;
      }
      if (failed.has(index)) {
        failures.push({ peer: peer.name, error: failed.get(index) });
      }
    });

    if (!failures.length) return records;

    // A lone peer has no siblings to fall back on, so its failure is the answer.
    if (propagate || this.peers.length === 1) {
      throw new PeerUnavailableError(
        `Peer request failed: ${failures.map((failure) => failure.peer).join(', ')}`,
        failures
      );
    }

    for (const failure of failures) {
      console.warn('peer_fetch_failed', {
        peer: failure.peer,
        game,
        version,
        idType,
        message: describeError(failure.error),
      });
    }

    return records;
  }
}
