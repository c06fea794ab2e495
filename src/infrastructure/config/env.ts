import { z } from 'zod';
import type { PipelineConfig } from '../../application/pipeline-config.js';
import { LEVEL_LABELS, isLevelLabel } from '../../application/record-builder.js';
import type { LevelLabel } from '../../application/record-builder.js';

/** Environment variable names understood by the collector and the env helpers. */
export const ENV = {
  dsn: 'LOG_SINK_DSN',
  serviceName: 'LOG_SINK_SERVICE_NAME',
  queueCapacity: 'LOG_SINK_QUEUE_CAPACITY',
  batchSize: 'LOG_SINK_BATCH_SIZE',
  flushIntervalMs: 'LOG_SINK_FLUSH_INTERVAL_MS',
  minLevel: 'LOG_SINK_MIN_LEVEL',
  httpTimeoutMs: 'LOG_SINK_HTTP_TIMEOUT_MS',
} as const;

const levelLabelSchema = z.custom<LevelLabel>(
  (value) => typeof value === 'string' && isLevelLabel(value),
  { message: `Must be one of: ${LEVEL_LABELS.join(', ')}` },
);

/** Empty strings count as unset, the way shells usually mean them. */
const optionalInt = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.coerce.number().int().optional(),
);

const envSchema = z.object({
  [ENV.dsn]: z.string().trim().min(1).default('noop://'),
  [ENV.serviceName]: z.string().trim().min(1).optional(),
  [ENV.queueCapacity]: optionalInt,
  [ENV.batchSize]: optionalInt,
  [ENV.flushIntervalMs]: optionalInt,
  [ENV.minLevel]: levelLabelSchema.default('error'),
  [ENV.httpTimeoutMs]: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: levelLabelSchema.default('info'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
});

export interface EnvConfig {
  dsn: string;
  serviceName: string | undefined;
  /** Raw overrides; clamped by `resolvePipelineConfig`. */
  pipeline: Partial<PipelineConfig>;
  minLevel: LevelLabel;
  httpTimeoutMs: number;
  logLevel: LevelLabel;
  host: string;
  port: number;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reads collector settings from the environment.
 *
 * Unset values take defaults. Values that are present but malformed
 * (e.g. a non-numeric batch size) are a startup error: silently falling
 * back would hide the typo.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  return {
    dsn: values[ENV.dsn],
    serviceName: values[ENV.serviceName],
    pipeline: {
      queueCapacity: values[ENV.queueCapacity],
      batchSize: values[ENV.batchSize],
      flushIntervalMs: values[ENV.flushIntervalMs],
    },
    minLevel: values[ENV.minLevel],
    httpTimeoutMs: values[ENV.httpTimeoutMs],
    logLevel: values.LOG_LEVEL,
    host: values.HOST,
    port: values.PORT,
  };
}
