import { z } from 'zod';

import { MAX_BATCH_SIZE, RISK_MODES, type ProviderName } from '@tracksync/contracts';

export type ProviderFlags = Record<ProviderName, boolean>;

export type RedisConnectionOptions = {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
  tls?: { servername?: string };
};

const booleanFlag = z
  .string()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase()));

const EnvSchema = z
  .object({
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

    // ========== Matching ==========
    TRACKSYNC_RISK_MODE: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(RISK_MODES))
      .default('strict'),
    TRACKSYNC_CANDIDATES_TOP_K: z.coerce.number().int().positive().default(3),

    // ========== Transfer ==========
    TRACKSYNC_BATCH_SIZE: z.coerce.number().int().min(1).max(MAX_BATCH_SIZE).default(MAX_BATCH_SIZE),
    TRACKSYNC_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    // Forces every transfer into dry-run mode
    TRACKSYNC_ROLLBACK: booleanFlag.default('false'),

    // ========== Checkpoints & reports ==========
    CHECKPOINT_BACKEND: z.enum(['file', 'redis', 'memory']).default('file'),
    CHECKPOINT_DIR: z.string().min(1).default('./checkpoints'),
    REDIS_URL: z.string().url().optional(),
    REPORT_DIR: z.string().min(1).default('./reports'),

    // ========== Providers ==========
    PROVIDERS_SPOTIFY: booleanFlag.default('true'),
    PROVIDERS_FILE: booleanFlag.default('true'),
    SPOTIFY_ACCESS_TOKEN: z.string().optional(),
    SPOTIFY_API_BASE_URL: z.string().url().default('https://api.spotify.com/v1'),
    SPOTIFY_MARKET: z.string().length(2).optional(),
    SPOTIFY_SEARCH_LIMIT: z.coerce.number().int().min(1).max(50).default(20),
  })
  .refine((data) => data.CHECKPOINT_BACKEND !== 'redis' || Boolean(data.REDIS_URL), {
    message: 'REDIS_URL is required when CHECKPOINT_BACKEND=redis',
    path: ['REDIS_URL'],
  });

type Env = z.infer<typeof EnvSchema>;

export type WorkerConfig = {
  logLevel: Env['LOG_LEVEL'];
  riskMode: Env['TRACKSYNC_RISK_MODE'];
  candidatesTopK: number;
  batchSize: number;
  maxRetries: number;
  rollback: boolean;
  providers: ProviderFlags;
  checkpoint: {
    backend: Env['CHECKPOINT_BACKEND'];
    dir: string;
    redisUrl?: string;
  };
  reportDir: string;
  spotify: {
    accessToken?: string;
    baseUrl: string;
    market?: string;
    searchLimit: number;
  };
};

/** Raised when the environment does not validate; `issues` lists one line per problem. */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

const blankToUndefined = (env: NodeJS.ProcessEnv): Record<string, string | undefined> =>
  Object.fromEntries(Object.entries(env).map(([key, value]) => [key, value?.trim() ? value : undefined]));

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((err) => `${err.path.join('.') || 'env'}: ${err.message}`));
  }
  const data = parsed.data;

  return {
    logLevel: data.LOG_LEVEL,
    riskMode: data.TRACKSYNC_RISK_MODE,
    candidatesTopK: data.TRACKSYNC_CANDIDATES_TOP_K,
    batchSize: data.TRACKSYNC_BATCH_SIZE,
    maxRetries: data.TRACKSYNC_MAX_RETRIES,
    rollback: data.TRACKSYNC_ROLLBACK,
    providers: {
      spotify: data.PROVIDERS_SPOTIFY,
      file: data.PROVIDERS_FILE,
    },
    checkpoint: {
      backend: data.CHECKPOINT_BACKEND,
      dir: data.CHECKPOINT_DIR,
      redisUrl: data.REDIS_URL,
    },
    reportDir: data.REPORT_DIR,
    spotify: {
      accessToken: data.SPOTIFY_ACCESS_TOKEN,
      baseUrl: data.SPOTIFY_API_BASE_URL,
      market: data.SPOTIFY_MARKET,
      searchLimit: data.SPOTIFY_SEARCH_LIMIT,
    },
  };
}

export function parseRedisUrl(urlString: string): RedisConnectionOptions {
  const url = new URL(urlString);
  const options: RedisConnectionOptions = {
    host: url.hostname,
    port: url.port ? Number(url.port) : 6379,
  };

  if (url.username) {
    options.username = decodeURIComponent(url.username);
  }
  if (url.password) {
    options.password = decodeURIComponent(url.password);
  }

  if (url.pathname && url.pathname.length > 1) {
    const dbValue = Number(url.pathname.replace('/', ''));
    if (!Number.isNaN(dbValue)) {
      options.db = dbValue;
    }
  }

  if (url.protocol === 'rediss:') {
    options.tls = { servername: url.hostname };
  }

  return options;
}
