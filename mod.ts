// bandwatch public API
export { FeedSchema, FeedKindEnum, RescaleSchema, tickDecimals } from "./src/lib/types/feed.ts";
export type { Feed, FeedKind, Rescale } from "./src/lib/types/feed.ts";
export { toSnapshotRecord, samePrices, isoTimestamp, MAX_RECORD_TS } from "./src/lib/types/snapshot.ts";
export type {
  BiasKind,
  BiasRecord,
  CorrectedSnapshot,
  DiagnosticReason,
  DiagnosticRecord,
  EmittedRecord,
  RawTriplet,
  Scope,
  SnapshotRecord,
  ViolationKind,
} from "./src/lib/types/snapshot.ts";

export { normalizePrice, normalizeTriplet, roundToTick } from "./src/snapshot/normalize.ts";
export { validateTriplet, DEFAULT_VALIDATOR_OPTIONS } from "./src/snapshot/validator.ts";
export type { ValidatorOptions, ValidationResult } from "./src/snapshot/validator.ts";
export { SnapshotStateTracker } from "./src/state/snapshot_tracker.ts";
export type { FeedPhase, FeedState, TrackerOutcome } from "./src/state/snapshot_tracker.ts";
export { BandBias } from "./src/signals/band-bias.ts";
export type { BandBiasResult } from "./src/signals/band-bias.ts";

export { SnapshotEngine } from "./src/runtime/engine.ts";
export type { CycleResult, CycleStatus, EngineOptions } from "./src/runtime/engine.ts";
export { runEngine } from "./src/runtime/runner.ts";
export type { EngineStats, RunnerConfig } from "./src/runtime/runner.ts";
export type {
  BarCloseEvent,
  BarEventSource,
  BarRange,
  EmissionSink,
  PriceSource,
  SnapshotSource,
} from "./src/runtime/interfaces.ts";
export { MemoryMarketData } from "./src/runtime/memory.ts";
export { FileReplaySource, JsonlEmissionSink, feedDirName } from "./src/runtime/file.ts";
export { ConsoleEmissionSink, LoggingEmissionSink, MemoryEmissionSink } from "./src/runtime/sinks.ts";
export { NatsEmissionSink } from "./src/runtime/nats.ts";

export { summarizeRecords, readRecordsFile } from "./src/quality/report.ts";
export type { FeedQuality } from "./src/quality/report.ts";
export { EngineConfigSchema, loadEngineConfig, parseEngineConfig } from "./src/config.ts";
export type { EngineConfig } from "./src/config.ts";
