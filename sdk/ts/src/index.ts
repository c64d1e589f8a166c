import { z } from 'zod';

export type PeerIdType = 'card' | 'server';

export type MatchQuality = 'exact' | 'partial';

/**
 * A profile as a peer server reports it. Game specific keys vary; peers also
 * attach a `cards` list and a `match` marker.
 */
export type RawProfileRecord = Record<string, unknown>;

export interface PeerProfilesRequest {
  type: PeerIdType;
  ids: string[];
}

export interface PeerProfilesResponse {
  profiles: RawProfileRecord[];
}

export interface RetryPolicy {
  attempts?: number;
  backoffMs?: number;
  retryOnStatuses?: number[];
}

export interface PeerClientOptions {
  name: string;
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  retry?: RetryPolicy;
  defaultHeaders?: Record<string, string>;
}

export interface PeerCallOptions {
  signal?: AbortSignal;
}

export class PeerRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(message);
    this.name = 'PeerRequestError';
  }
}

const ProfilesResponseSchema = z.object({
  profiles: z.array(z.unknown()),
});

const isRecord = (value: unknown): value is RawProfileRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export class PeerClient {
  readonly name: string;
  private readonly baseUrl: URL;
  private readonly token?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly retry: Required<RetryPolicy>;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: PeerClientOptions) {
    this.name = options.name;
    this.baseUrl = new URL(options.baseUrl);
    this.token = options.token;
    this.timeoutMs = Math.max(0, options.timeoutMs ?? 5_000);
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch?.bind(globalThis);
    if (!this.fetchImpl) {
      throw new Error('Global fetch implementation not found. Pass options.fetchImpl explicitly.');
    }

    this.retry = {
      attempts: Math.max(1, options.retry?.attempts ?? 1),
      backoffMs: Math.max(0, options.retry?.backoffMs ?? 250),
      retryOnStatuses: options.retry?.retryOnStatuses ?? [408, 429, 500, 502, 503, 504],
    };

    this.defaultHeaders = {
      'Content-Type': 'application/json',
      ...options.defaultHeaders,
    };
  }

  /**
   * Asks the peer for profiles of `game`/`version`. With `idType` `card` the
   * peer filters by the given card ids; with `server` it returns everything
   * it knows and `ids` is ignored.
   */
  async getProfiles(
    game: string,
    version: number,
    idType: PeerIdType,
    ids: string[],
    options: PeerCallOptions = {}
  ): Promise<RawProfileRecord[]> {
    const payload: PeerProfilesRequest = { type: idType, ids: idType === 'card' ? ids : [] };
    const body = await this.request(
      `/v1/peer/${encodeURIComponent(game)}/${version}/profiles`,
      { method: 'POST', body: JSON.stringify(payload) },
      options.signal
    );

    const parsed = ProfilesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PeerRequestError(`Peer ${this.name} returned a malformed profiles response`, 200, body);
    }
    return parsed.data.profiles.filter(isRecord);
  }

  private async request(path: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    const headers = new Headers(this.defaultHeaders);
    if (init.headers) {
      new Headers(init.headers).forEach((value, key) => headers.set(key, value));
    }
    if (this.token) {
      headers.set('Authorization', `Bearer ${this.token}`);
    }

    const attemptRequest = async (attempt: number): Promise<unknown> => {
      const { signal: attemptSignal, dispose } = this.linkSignal(signal);
      let response: Response;
      let body: unknown;
      // The timeout covers the body as well as the headers.
      try {
        response = await this.fetchImpl(url, { ...init, headers, signal: attemptSignal });
        body = await this.safeParseBody(response);
      } finally {
        dispose();
      }

      if (!response.ok) {
        const shouldRetry =
          attempt + 1 < this.retry.attempts &&
          this.retry.retryOnStatuses.includes(response.status) &&
          !signal?.aborted;

        if (shouldRetry) {
          await this.delay(this.retry.backoffMs * Math.pow(2, attempt));
          return attemptRequest(attempt + 1);
        }

        throw new PeerRequestError(
          `Request to ${this.name}${url.pathname} failed with status ${response.status}`,
          response.status,
          body
        );
      }

      return body;
    };

    return attemptRequest(0);
  }

  // Combines the caller's signal with the per-request timeout.
  private linkSignal(signal?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);

    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const timer =
      this.timeoutMs > 0
        ? setTimeout(
            () => controller.abort(new Error(`Peer ${this.name} timed out after ${this.timeoutMs}ms`)),
            this.timeoutMs
          )
        : undefined;

    return {
      signal: controller.signal,
      dispose: () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      },
    };
  }

  private async safeParseBody(response: Response): Promise<unknown> {
    if (response.status === 204) {
      return null;
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
      return response.json();
    }

    return response.text();
  }

  private async delay(ms: number): Promise<void> {
    if (ms <= 0) return;
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}
