// Sync Services - Re-exports
export {
  MEASUREMENT_FAMILIES,
  findFamily,
  keySeriesOf,
  resourcePath,
  type MeasurementFamily,
  type SeriesSpec,
} from "./families.js";
export { planIntervals, splitRange, type IntervalPlan } from "./intervals.js";
export {
  RateLimitedFetcher,
  decideRetry,
  DEFAULT_RETRY_POLICY,
  type RetryDecision,
  type RetryPolicy,
} from "./fetcher.js";
export { extractItems, transformItem, transformItems } from "./transform.js";
export {
  PostgresSeriesStore,
  truncateToPrecision,
  type SeriesStore,
} from "./store.js";
export { SyncWriter, type WriteResult } from "./writer.js";
export {
  PassScheduler,
  PassStoppedError,
  SyncLoop,
  type PassSummary,
  type SeriesPlan,
  type SyncProgress,
  type SyncState,
} from "./loop.js";
