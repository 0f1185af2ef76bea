import { z } from 'zod';

const DEFAULT_OPENSKY_STATES_URL = 'https://opensky-network.org/api/states/all';

const integerString = z
  .string()
  .trim()
  .regex(/^\d+$/);

const decimalString = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/);

const booleanString = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }

    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }

    if (['true', '1', 'yes'].includes(normalized)) {
      return true;
    }

    if (['false', '0', 'no'].includes(normalized)) {
      return false;
    }

    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'must be one of true, false, 1, 0, yes, or no when provided',
    });
    return z.NEVER;
  });

const rawConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: integerString.optional(),
  FLIGHT_LIST_URL: z.string().url().default(DEFAULT_OPENSKY_STATES_URL),
  FLIGHT_DETAIL_URL: z.string().url().default(DEFAULT_OPENSKY_STATES_URL),
  UPSTREAM_USERNAME: z.string().optional(),
  UPSTREAM_PASSWORD: z.string().optional(),
  UPSTREAM_TIMEOUT_MS: integerString.optional(),
  FLIGHT_LIST_MAX_ENTRIES: integerString.optional(),
  INDEX_BACKEND: z.enum(['elasticsearch', 'memory']).default('elasticsearch'),
  ELASTICSEARCH_URL: z.string().url().default('http://elasticsearch:9200'),
  ELASTICSEARCH_INDEX: z
    .string()
    .trim()
    .regex(/^[a-z0-9][a-z0-9_.-]*$/, 'ELASTICSEARCH_INDEX must be a lowercase index name')
    .default('flights'),
  ELASTICSEARCH_USERNAME: z.string().optional(),
  ELASTICSEARCH_PASSWORD: z.string().optional(),
  ELASTICSEARCH_TIMEOUT_MS: integerString.optional(),
  CYCLE_MAX_CONCURRENCY: integerString.optional(),
  CYCLE_ITEM_TIMEOUT_MS: integerString.optional(),
  CYCLE_ITEM_MAX_RETRIES: integerString.optional(),
  CYCLE_RETRY_BASE_MS: integerString.optional(),
  CYCLE_RETRY_MULTIPLIER: decimalString.optional(),
  CYCLE_RETRY_MAX_MS: integerString.optional(),
  CYCLE_RETRY_JITTER_RATIO: decimalString.optional(),
  CYCLE_TIMEOUT_MS: integerString.optional(),
  CYCLE_DEDUPE: booleanString,
  SCHEDULER_ENABLED: booleanString,
  SCHEDULER_INTERVAL_MINUTES: integerString.optional(),
  APPINSIGHTS_CONNECTION_STRING: z.string().optional(),
  APPINSIGHTS_ROLE_NAME: z.string().optional(),
  APPINSIGHTS_SAMPLING_PERCENTAGE: z.string().optional(),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

export type BasicCredentials = {
  username: string;
  password: string;
};

export type IndexBackend = RawConfig['INDEX_BACKEND'];

export type AppConfig = {
  nodeEnv: RawConfig['NODE_ENV'];
  port: number;
  upstream: {
    listUrl: string;
    detailUrl: string;
    timeoutMs: number;
    maxListEntries: number;
    credentials: BasicCredentials | null;
  };
  index: {
    backend: IndexBackend;
    elasticsearch: {
      url: string;
      index: string;
      timeoutMs: number;
      credentials: BasicCredentials | null;
    };
  };
  cycle: {
    maxConcurrency: number;
    perItemTimeoutMs: number;
    perItemMaxRetries: number;
    retryBackoff: {
      baseMs: number;
      multiplier: number;
      maxMs: number;
      jitterRatio: number;
    };
    cycleTimeoutMs: number | null;
    dedupe: boolean;
  };
  scheduler: {
    enabled: boolean;
    intervalMinutes: number;
  };
  telemetry: {
    appInsights: {
      connectionString: string;
      roleName: string | null;
      samplingPercentage: number | null;
    } | null;
  };
};

const toInt = (value: string | undefined, fallback: number): number =>
  value ? Number.parseInt(value, 10) : fallback;

const toPositiveInt = (name: string, value: string | undefined, fallback: number): number => {
  const parsed = toInt(value, fallback);
  if (parsed < 1) {
    throw new Error(`${name} must be greater than zero when provided`);
  }

  return parsed;
};

const toCredentials = (
  username: string | undefined,
  password: string | undefined,
): BasicCredentials | null => {
  const trimmedUser = username?.trim();
  if (!trimmedUser) {
    return null;
  }

  return { username: trimmedUser, password: password ?? '' };
};

const normalizeSamplingPercentage = (value?: string | null): number | null => {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }

  const parsed = Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new Error(
      'APPINSIGHTS_SAMPLING_PERCENTAGE must be a number between 0 and 100 when provided',
    );
  }

  return parsed;
};

const buildRetryBackoff = (parsed: RawConfig): AppConfig['cycle']['retryBackoff'] => {
  const baseMs = toInt(parsed.CYCLE_RETRY_BASE_MS, 500);
  const maxMs = toInt(parsed.CYCLE_RETRY_MAX_MS, 10_000);
  const multiplier = parsed.CYCLE_RETRY_MULTIPLIER
    ? Number.parseFloat(parsed.CYCLE_RETRY_MULTIPLIER)
    : 2;
  const jitterRatio = parsed.CYCLE_RETRY_JITTER_RATIO
    ? Number.parseFloat(parsed.CYCLE_RETRY_JITTER_RATIO)
    : 0.2;

  if (maxMs < baseMs) {
    throw new Error('CYCLE_RETRY_MAX_MS must not be lower than CYCLE_RETRY_BASE_MS');
  }

  if (multiplier < 1) {
    throw new Error('CYCLE_RETRY_MULTIPLIER must be at least 1');
  }

  if (jitterRatio > 1) {
    throw new Error('CYCLE_RETRY_JITTER_RATIO must be between 0 and 1');
  }

  return { baseMs, multiplier, maxMs, jitterRatio };
};

export const buildConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = rawConfigSchema.parse(env);

  const samplingPercentage = normalizeSamplingPercentage(parsed.APPINSIGHTS_SAMPLING_PERCENTAGE);
  const appInsightsConnectionString = parsed.APPINSIGHTS_CONNECTION_STRING?.trim();

  return {
    nodeEnv: parsed.NODE_ENV,
    port: toInt(parsed.PORT, 3000),
    upstream: {
      listUrl: parsed.FLIGHT_LIST_URL,
      detailUrl: parsed.FLIGHT_DETAIL_URL,
      timeoutMs: toPositiveInt('UPSTREAM_TIMEOUT_MS', parsed.UPSTREAM_TIMEOUT_MS, 10_000),
      maxListEntries: toPositiveInt(
        'FLIGHT_LIST_MAX_ENTRIES',
        parsed.FLIGHT_LIST_MAX_ENTRIES,
        20_000,
      ),
      credentials: toCredentials(parsed.UPSTREAM_USERNAME, parsed.UPSTREAM_PASSWORD),
    },
    index: {
      backend: parsed.INDEX_BACKEND,
      elasticsearch: {
        url: parsed.ELASTICSEARCH_URL,
        index: parsed.ELASTICSEARCH_INDEX,
        timeoutMs: toPositiveInt('ELASTICSEARCH_TIMEOUT_MS', parsed.ELASTICSEARCH_TIMEOUT_MS, 5_000),
        credentials: toCredentials(parsed.ELASTICSEARCH_USERNAME, parsed.ELASTICSEARCH_PASSWORD),
      },
    },
    cycle: {
      maxConcurrency: toPositiveInt('CYCLE_MAX_CONCURRENCY', parsed.CYCLE_MAX_CONCURRENCY, 10),
      perItemTimeoutMs: toPositiveInt('CYCLE_ITEM_TIMEOUT_MS', parsed.CYCLE_ITEM_TIMEOUT_MS, 15_000),
      perItemMaxRetries: toInt(parsed.CYCLE_ITEM_MAX_RETRIES, 3),
      retryBackoff: buildRetryBackoff(parsed),
      cycleTimeoutMs: parsed.CYCLE_TIMEOUT_MS
        ? toPositiveInt('CYCLE_TIMEOUT_MS', parsed.CYCLE_TIMEOUT_MS, 1)
        : null,
      dedupe: parsed.CYCLE_DEDUPE ?? false,
    },
    scheduler: {
      enabled: parsed.SCHEDULER_ENABLED ?? false,
      intervalMinutes: toInt(parsed.SCHEDULER_INTERVAL_MINUTES, 5),
    },
    telemetry: {
      appInsights: appInsightsConnectionString
        ? {
            connectionString: appInsightsConnectionString,
            roleName: parsed.APPINSIGHTS_ROLE_NAME?.trim() || null,
            samplingPercentage,
          }
        : null,
    },
  };
};
