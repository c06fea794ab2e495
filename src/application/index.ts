export {
  DEFAULT_PIPELINE_CONFIG,
  PIPELINE_CONFIG_FLOORS,
  DEFAULT_RETRY_POLICY,
  clampSetting,
  resolvePipelineConfig,
  resolveRetryPolicy,
} from './pipeline-config.js';
export type { PipelineConfig, RetryPolicy } from './pipeline-config.js';
export { PipelineCounters } from './pipeline-counters.js';
export type { CountersSnapshot } from './pipeline-counters.js';
export { IngestionQueue } from './ingestion-queue.js';
export type { OfferResult } from './ingestion-queue.js';
export { BatchAggregator } from './batch-aggregator.js';
export type { CollectOutcome, Clock } from './batch-aggregator.js';
export { DeliveryEngine, sleep } from './delivery-engine.js';
export type { DeliveryEngineOptions, Sleep } from './delivery-engine.js';
export { createPipeline, PipelineHandle } from './pipeline.js';
export type { Pipeline, PipelineOptions } from './pipeline.js';
export {
  LOG_LEVEL_VALUES,
  LEVEL_LABELS,
  buildRecordFromLogLine,
  isLevelLabel,
  levelAtLeast,
  levelName,
  levelValue,
  parseCaller,
} from './record-builder.js';
export type { LevelLabel, RecordBuilderOptions } from './record-builder.js';
export {
  logRecordInputSchema,
  logRecordBatchSchema,
  toLogRecord,
  MAX_BATCH_RECORDS,
} from './log-schema.js';
export type { LogRecordInputBody } from './log-schema.js';
