/**
 * Buffering and batching settings, read once when a pipeline is built.
 *
 * Invalid or too-small inputs are clamped, never rejected: a bad knob
 * must not keep the host application from starting.
 */
export interface PipelineConfig {
  /** Records the ingestion queue holds before new ones are dropped. */
  readonly queueCapacity: number;
  /** Batch length that triggers a flush without waiting for the interval. */
  readonly batchSize: number;
  /** Longest time a non-empty batch waits before it is flushed. */
  readonly flushIntervalMs: number;
}

export interface RetryPolicy {
  readonly initialBackoffMs: number;
  readonly maxBackoffMs: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = Object.freeze({
  queueCapacity: 1024,
  batchSize: 128,
  flushIntervalMs: 1000,
});

export const PIPELINE_CONFIG_FLOORS: PipelineConfig = Object.freeze({
  queueCapacity: 16,
  batchSize: 1,
  flushIntervalMs: 10,
});

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  initialBackoffMs: 100,
  maxBackoffMs: 10_000,
});

/**
 * Clamps a single numeric setting.
 * Missing or non-finite values take the default; fractions are truncated;
 * anything below the floor is raised to it.
 */
export function clampSetting(raw: number | undefined, fallback: number, floor: number): number {
  if (raw === undefined || !Number.isFinite(raw)) return fallback;
  return Math.max(Math.trunc(raw), floor);
}

export function resolvePipelineConfig(input: Partial<PipelineConfig> = {}): PipelineConfig {
  return Object.freeze({
    queueCapacity: clampSetting(
      input.queueCapacity,
      DEFAULT_PIPELINE_CONFIG.queueCapacity,
      PIPELINE_CONFIG_FLOORS.queueCapacity,
    ),
    batchSize: clampSetting(
      input.batchSize,
      DEFAULT_PIPELINE_CONFIG.batchSize,
      PIPELINE_CONFIG_FLOORS.batchSize,
    ),
    flushIntervalMs: clampSetting(
      input.flushIntervalMs,
      DEFAULT_PIPELINE_CONFIG.flushIntervalMs,
      PIPELINE_CONFIG_FLOORS.flushIntervalMs,
    ),
  });
}

export function resolveRetryPolicy(input: Partial<RetryPolicy> = {}): RetryPolicy {
  const initialBackoffMs = clampSetting(input.initialBackoffMs, DEFAULT_RETRY_POLICY.initialBackoffMs, 1);
  const maxBackoffMs = clampSetting(input.maxBackoffMs, DEFAULT_RETRY_POLICY.maxBackoffMs, initialBackoffMs);
  return Object.freeze({ initialBackoffMs, maxBackoffMs });
}
