import { z } from 'zod';

const PeerConfigSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  token: z.string().min(1).optional(),
});

export type PeerConfig = z.infer<typeof PeerConfigSchema>;

const PeersSchema = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    if (!raw || !raw.trim()) return [];
    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'PEERS must be a JSON array' });
      return z.NEVER;
    }
  })
  .pipe(
    z.array(PeerConfigSchema).refine((peers) => new Set(peers.map((peer) => peer.name)).size === peers.length, {
      message: 'peer names must be unique',
    })
  );

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  DATABASE_URL: z.string().min(1).optional(),
  PEERS: PeersSchema,
  PEER_TIMEOUT_MS: z.coerce.number().int().min(0).default(5_000),
  PEER_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(1),
  PEER_FAILURE_POLICY: z.enum(['degrade', 'propagate']).default('degrade'),
});

export interface ServiceConfig {
  port: number;
  databaseUrl?: string;
  peers: PeerConfig[];
  peerTimeoutMs: number;
  peerRetryAttempts: number;
  peerFailurePolicy: 'degrade' | 'propagate';
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${summary}`, parsed.error.issues);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    peers: values.PEERS,
    peerTimeoutMs: values.PEER_TIMEOUT_MS,
    peerRetryAttempts: values.PEER_RETRY_ATTEMPTS,
    peerFailurePolicy: values.PEER_FAILURE_POLICY,
  };
};
