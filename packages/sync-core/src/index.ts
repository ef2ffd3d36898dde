/**
 * @klinevault/sync-core
 *
 * Incremental candle synchronization: windows, gaps, normalization,
 * statistics and named operations
 */

export { parseLookback, parseWindowTimestamp, resolveWindow } from './window/window-resolver';
export type { ResolveWindowOptions } from './window/window-resolver';
export { detectGaps } from './gaps/gap-detector';
export { normalizeKlines } from './normalize/record-normalizer';
export { aggregateVolumeStats } from './stats/stats-aggregator';
export type { VolumeStats } from './stats/stats-aggregator';

export { KlineSyncEngine } from './engine/kline-sync-engine';
export type { KlineSyncEngineDeps } from './engine/kline-sync-engine';
export { createSyncEngine } from './engine/create-engine';
export type { CreateEngineOptions } from './engine/create-engine';
export type {
  KlineRangeFetcher,
  SliceSummary,
  StatsSummary,
  SyncOptions,
  SyncSummary,
} from './engine/types';

export { assertDisplayTimezone, loadAppConfig, readJsonFile, toAppConfig } from './config/config-loader';
export { loadOperations, OperationRunner, parseOperations } from './operations/operations';
export type { OperationOutcome } from './operations/operations';
