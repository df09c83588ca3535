// bandwatch/src/runtime/interfaces.ts
import type { Feed } from "../lib/types/feed.ts";
import type { EmittedRecord, RawTriplet, Scope } from "../lib/types/snapshot.ts";

/**
 * A bar-close event from the charting host
 */
export interface BarCloseEvent {
  feedId: string;
  barIndex: number;
  /** Bar timestamp, Unix seconds */
  ts: number;
}

/** Inclusive range of bar indices the host currently holds for a feed */
export interface BarRange {
  first: number;
  last: number;
}

/**
 * Read-only access to the host's per-bar indicator arrays.
 * Implementations: MemoryMarketData (also backs FileReplaySource)
 */
export interface SnapshotSource {
  /** Bar indices available for the feed, or null when the feed has no data */
  barRange(feed: Feed): BarRange | null;

  /** Raw triplet for a bar and scope, or null when not available */
  readTriplet(feed: Feed, scope: Scope, barIndex: number): RawTriplet | null;
}

/**
 * Latest trade price per feed.
 */
export interface PriceSource {
  lastPrice(feed: Feed): number | null;
}

/**
 * Source of bar-close events.
 * Implementations: FileReplaySource
 */
export interface BarEventSource {
  /**
   * Subscribe to bar-close events.
   * Returns an async iterator that yields events until close() is called.
   */
  subscribe(): AsyncIterable<BarCloseEvent>;

  /**
   * Gracefully close the source and release resources.
   */
  close(): Promise<void>;
}

/**
 * Append-only writer for emitted records.
 * Implementations: ConsoleEmissionSink, LoggingEmissionSink, MemoryEmissionSink,
 * JsonlEmissionSink, NatsEmissionSink
 */
export interface EmissionSink {
  /**
   * Hand one record to the sink.
   */
  publish(record: EmittedRecord): Promise<void>;

  /**
   * Gracefully close the sink and release resources.
   */
  close(): Promise<void>;
}
