// bandwatch/src/runtime/memory.ts
import type { Feed } from "../lib/types/feed.ts";
import type { RawTriplet, Scope } from "../lib/types/snapshot.ts";
import type { BarRange, PriceSource, SnapshotSource } from "./interfaces.ts";

interface BarSlot {
  current?: RawTriplet;
  previous?: RawTriplet;
}

/**
 * In-process stand-in for the host's indicator arrays and trade prices.
 * Bars are keyed by feed id and bar index; the reported range spans the
 * lowest to highest index written for the feed.
 */
export class MemoryMarketData implements SnapshotSource, PriceSource {
  private bars = new Map<string, Map<number, BarSlot>>();
  private ranges = new Map<string, BarRange>();
  private prices = new Map<string, number>();

  setTriplet(feedId: string, barIndex: number, triplet: RawTriplet, scope: Scope = "current"): this {
    let slots = this.bars.get(feedId);
    if (!slots) {
      slots = new Map();
      this.bars.set(feedId, slots);
    }
    const slot = slots.get(barIndex) ?? {};
    slot[scope] = { ...triplet };
    slots.set(barIndex, slot);

    const range = this.ranges.get(feedId);
    if (!range) {
      this.ranges.set(feedId, { first: barIndex, last: barIndex });
    } else {
      range.first = Math.min(range.first, barIndex);
      range.last = Math.max(range.last, barIndex);
    }
    return this;
  }

  setLastPrice(feedId: string, price: number | null): this {
    if (price === null) {
      this.prices.delete(feedId);
    } else {
      this.prices.set(feedId, price);
    }
    return this;
  }

  barRange(feed: Feed): BarRange | null {
    const range = this.ranges.get(feed.id);
    return range ? { ...range } : null;
  }

  readTriplet(feed: Feed, scope: Scope, barIndex: number): RawTriplet | null {
    const triplet = this.bars.get(feed.id)?.get(barIndex)?.[scope];
    return triplet ? { ...triplet } : null;
  }

  lastPrice(feed: Feed): number | null {
    return this.prices.get(feed.id) ?? null;
  }

  clear(): void {
    this.bars.clear();
    this.ranges.clear();
    this.prices.clear();
  }
}
