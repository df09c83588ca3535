import type { Feed } from "../lib/types/feed.ts";
import {
  toSnapshotRecord,
  type DiagnosticReason,
  type DiagnosticRecord,
  type EmittedRecord,
  type Scope,
  type CorrectedSnapshot,
} from "../lib/types/snapshot.ts";
import { normalizePrice, normalizeTriplet } from "../snapshot/normalize.ts";
import { validateTriplet, DEFAULT_VALIDATOR_OPTIONS, type ValidatorOptions } from "../snapshot/validator.ts";
import { SnapshotStateTracker, type FeedState } from "../state/snapshot_tracker.ts";
import { BandBias } from "../signals/band-bias.ts";
import type { BarCloseEvent, PriceSource, SnapshotSource } from "./interfaces.ts";

export interface EngineOptions {
  feeds: Feed[];
  source: SnapshotSource;
  prices: PriceSource;
  validator?: ValidatorOptions;
  /** Seed an empty feed's lineage from the host's previous-scope triplet */
  seedPreviousFromHost?: boolean;
}

export type CycleStatus = "accepted" | "suppressed" | "no-data";

export interface CycleResult {
  status: CycleStatus;
  feedId: string;
  /** Bar index after clamping to the source's bounds */
  barIndex: number;
  records: EmittedRecord[];
}

interface Cycle {
  feed: Feed;
  ts: number;
  barIndex: number;
  records: EmittedRecord[];
}

/**
 * Runs one bar-close event through read -> normalize -> validate -> track -> bias.
 * Every call is synchronous and never throws for missing or bad host data;
 * those outcomes surface as diagnostic records.
 */
export class SnapshotEngine {
  private readonly feeds: Map<string, Feed>;
  private readonly source: SnapshotSource;
  private readonly prices: PriceSource;
  private readonly validator: ValidatorOptions;
  private readonly seedPreviousFromHost: boolean;
  private readonly tracker = new SnapshotStateTracker();
  private readonly biases = new Map<string, BandBias>();

  constructor(options: EngineOptions) {
    this.feeds = new Map(options.feeds.map((f) => [f.id, f]));
    this.source = options.source;
    this.prices = options.prices;
    this.validator = options.validator ?? DEFAULT_VALIDATOR_OPTIONS;
    this.seedPreviousFromHost = options.seedPreviousFromHost ?? false;

    for (const feed of options.feeds) {
      this.biases.set(feed.id, new BandBias({ tickSize: feed.tickSize }));
    }
  }

  process(event: BarCloseEvent): CycleResult {
    const feed = this.feeds.get(event.feedId);
    if (!feed) {
      const diag: DiagnosticRecord = {
        kind: "diagnostic",
        feed: event.feedId,
        ts: event.ts,
        barIndex: event.barIndex,
        reason: "source_unavailable",
        detail: "unknown feed",
      };
      return { status: "no-data", feedId: event.feedId, barIndex: event.barIndex, records: [diag] };
    }

    const suppressed = (barIndex: number): CycleResult =>
      ({ status: "suppressed", feedId: feed.id, barIndex, records: [] });

    if (this.tracker.isDuplicate(feed.id, event.barIndex)) return suppressed(event.barIndex);

    const cycle: Cycle = { feed, ts: event.ts, barIndex: event.barIndex, records: [] };

    const range = this.source.barRange(feed);
    if (!range || range.last < range.first) {
      this.diagnose(cycle, "bounds_exhausted", { detail: "no bars available" });
      return this.finish(cycle, "no-data");
    }

    cycle.barIndex = Math.min(Math.max(event.barIndex, range.first), range.last);
    if (cycle.barIndex !== event.barIndex && this.tracker.isDuplicate(feed.id, cycle.barIndex)) {
      return suppressed(cycle.barIndex);
    }

    const current = this.readSnapshot(cycle, "current");
    if (!current) {
      this.tracker.apply(feed.id, cycle.barIndex, null);
      return this.finish(cycle, "no-data");
    }

    if (this.seedPreviousFromHost && this.tracker.state(feed.id).phase === "empty") {
      const seed = this.readSnapshot(cycle, "previous");
      if (seed) this.tracker.seed(feed.id, seed);
    }

    const outcome = this.tracker.apply(feed.id, cycle.barIndex, current);
    if (outcome.status !== "accepted") {
      return this.finish(cycle, outcome.status);
    }

    if (outcome.previous) {
      cycle.records.push(toSnapshotRecord(feed.id, cycle.ts, "previous", outcome.previous));
    }
    cycle.records.push(toSnapshotRecord(feed.id, cycle.ts, "current", outcome.current));

    this.deriveBias(cycle, outcome.current);
    return this.finish(cycle, "accepted");
  }

  feedState(feedId: string): FeedState {
    return this.tracker.state(feedId);
  }

  feedIds(): string[] {
    return [...this.feeds.keys()];
  }

  private readSnapshot(cycle: Cycle, scope: Scope): CorrectedSnapshot | null {
    const raw = this.source.readTriplet(cycle.feed, scope, cycle.barIndex);
    if (!raw) {
      this.diagnose(cycle, "source_unavailable", { scope });
      return null;
    }

    const normalized = normalizeTriplet(raw, cycle.feed);
    if (!normalized.ok) {
      this.diagnose(cycle, "invalid_triplet", {
        scope,
        detail: `${normalized.field} ${normalized.reason} (${normalized.raw})`,
      });
      return null;
    }

    if (normalized.rescaled.length > 0) {
      const fields = normalized.rescaled
        .map((f) => `${f} ${raw[f]} -> ${normalized.triplet[f]}`)
        .join(", ");
      this.diagnose(cycle, "price_rescaled", { scope, detail: fields });
    }

    const result = validateTriplet(normalized.triplet, cycle.barIndex, this.validator);
    if (!result.valid) {
      this.diagnose(cycle, "invalid_triplet", { scope, detail: result.reason });
      return null;
    }

    return result.snapshot;
  }

  private deriveBias(cycle: Cycle, snapshot: CorrectedSnapshot): void {
    const raw = this.prices.lastPrice(cycle.feed);
    if (raw === null) {
      this.diagnose(cycle, "price_unavailable");
      return;
    }

    const price = normalizePrice(raw, cycle.feed);
    if (!price.ok) {
      this.diagnose(cycle, "price_unavailable", { detail: `last price ${price.reason} (${raw})` });
      return;
    }
    if (price.rescaled) {
      this.diagnose(cycle, "price_rescaled", { detail: `lastPrice ${raw} -> ${price.price}` });
    }

    const bias = this.biases.get(cycle.feed.id) ?? new BandBias({ tickSize: cycle.feed.tickSize });
    const result = bias.evaluate(snapshot, price.price);

    cycle.records.push({
      kind: "bias",
      feed: cycle.feed.id,
      ts: cycle.ts,
      barIndex: cycle.barIndex,
      lastPrice: price.price,
      bias: result.bias,
      targets: result.targets,
      confidence: result.confidence,
    });
  }

  private diagnose(
    cycle: Cycle,
    reason: DiagnosticReason,
    extra: { scope?: Scope; detail?: string } = {},
  ): void {
    const diag: DiagnosticRecord = {
      kind: "diagnostic",
      feed: cycle.feed.id,
      ts: cycle.ts,
      barIndex: cycle.barIndex,
      reason,
    };
    if (extra.scope) diag.scope = extra.scope;
    if (extra.detail) diag.detail = extra.detail;
    cycle.records.push(diag);
  }

  private finish(cycle: Cycle, status: CycleStatus): CycleResult {
    return { status, feedId: cycle.feed.id, barIndex: cycle.barIndex, records: cycle.records };
  }
}
