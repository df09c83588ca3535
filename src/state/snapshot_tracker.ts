import { samePrices, type CorrectedSnapshot } from "../lib/types/snapshot.ts";

export type FeedPhase = "empty" | "has-current" | "has-current-and-previous";

export interface FeedState {
  phase: FeedPhase;
  lastEmittedBarIndex?: number;
  /** Last accepted snapshot; becomes the previous-scope record on the next bar */
  previousSnapshot?: CorrectedSnapshot;
}

export type TrackerOutcome =
  | { status: "suppressed"; lastEmittedBarIndex: number }
  | { status: "no-data" }
  | { status: "accepted"; current: CorrectedSnapshot; previous: CorrectedSnapshot | null };

function copySnapshot(s: CorrectedSnapshot): CorrectedSnapshot {
  return { ...s, violations: [...s.violations] };
}

/**
 * Per-feed lineage of corrected snapshots.
 * Holds one state cell per feed id; a feed moves empty -> has-current ->
 * has-current-and-previous, and only on a new bar index carrying a valid
 * snapshot. Bar indices at or below the last emitted one are suppressed.
 */
export class SnapshotStateTracker {
  private feeds = new Map<string, FeedState>();

  private cell(feedId: string): FeedState {
    let state = this.feeds.get(feedId);
    if (!state) {
      state = { phase: "empty" };
      this.feeds.set(feedId, state);
    }
    return state;
  }

  isDuplicate(feedId: string, barIndex: number): boolean {
    const last = this.feeds.get(feedId)?.lastEmittedBarIndex;
    return last !== undefined && barIndex <= last;
  }

  apply(feedId: string, barIndex: number, snapshot: CorrectedSnapshot | null): TrackerOutcome {
    const state = this.cell(feedId);

    if (state.lastEmittedBarIndex !== undefined && barIndex <= state.lastEmittedBarIndex) {
      return { status: "suppressed", lastEmittedBarIndex: state.lastEmittedBarIndex };
    }

    // Stale state is kept as-is until a bar with data arrives
    if (!snapshot) return { status: "no-data" };

    const stored = state.previousSnapshot;
    const previous = stored && !samePrices(stored, snapshot) ? copySnapshot(stored) : null;

    state.previousSnapshot = copySnapshot(snapshot);
    state.lastEmittedBarIndex = barIndex;
    state.phase = state.phase === "empty" && !stored ? "has-current" : "has-current-and-previous";

    return { status: "accepted", current: copySnapshot(snapshot), previous };
  }

  /**
   * Install a host-provided previous snapshot on a feed that has none yet.
   * Returns false when the feed already holds lineage.
   */
  seed(feedId: string, snapshot: CorrectedSnapshot): boolean {
    const state = this.cell(feedId);
    if (state.previousSnapshot) return false;
    state.previousSnapshot = copySnapshot(snapshot);
    return true;
  }

  state(feedId: string): FeedState {
    const state = this.feeds.get(feedId);
    if (!state) return { phase: "empty" };

    const copy: FeedState = { phase: state.phase };
    if (state.lastEmittedBarIndex !== undefined) copy.lastEmittedBarIndex = state.lastEmittedBarIndex;
    if (state.previousSnapshot) copy.previousSnapshot = copySnapshot(state.previousSnapshot);
    return copy;
  }

  feedIds(): string[] {
    return [...this.feeds.keys()];
  }

  reset(feedId?: string): void {
    if (feedId === undefined) {
      this.feeds.clear();
    } else {
      this.feeds.delete(feedId);
    }
  }
}
