import { test } from "node:test";
import assert from "node:assert/strict";
import { FeedSchema } from "../../src/lib/types/feed.ts";
import type { EmittedRecord } from "../../src/lib/types/snapshot.ts";
import { SnapshotEngine } from "../../src/runtime/engine.ts";
import type { BarCloseEvent, BarEventSource, EmissionSink } from "../../src/runtime/interfaces.ts";
import { MemoryMarketData } from "../../src/runtime/memory.ts";
import { runEngine } from "../../src/runtime/runner.ts";
import { MemoryEmissionSink } from "../../src/runtime/sinks.ts";

const TS = 1750000000;
const es = FeedSchema.parse({ id: "es", symbol: "ESZ5", tickSize: 0.25 });

class ArrayEventSource implements BarEventSource {
  closed = false;

  constructor(private events: BarCloseEvent[]) {}

  async *subscribe(): AsyncIterable<BarCloseEvent> {
    for (const event of this.events) {
      if (this.closed) break;
      yield event;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class FailingSink implements EmissionSink {
  attempts = 0;
  closed = false;

  async publish(_record: EmittedRecord): Promise<void> {
    this.attempts++;
    throw new Error("sink down");
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function setup(): { engine: SnapshotEngine; events: ArrayEventSource } {
  const data = new MemoryMarketData()
    .setTriplet("es", 1, { reference: 6440, upper: 6430.75, lower: 6454 })
    .setTriplet("es", 2, { reference: 6445, upper: 6460, lower: 6435 })
    .setLastPrice("es", 6450);
  const engine = new SnapshotEngine({ feeds: [es], source: data, prices: data });
  const events = new ArrayEventSource([
    { feedId: "es", barIndex: 1, ts: TS },
    { feedId: "es", barIndex: 1, ts: TS },
    { feedId: "es", barIndex: 2, ts: TS + 60 },
    { feedId: "cl", barIndex: 2, ts: TS + 60 },
  ]);
  return { engine, events };
}

test("runEngine publishes every record and counts outcomes", async () => {
  const { engine, events } = setup();
  const sink = new MemoryEmissionSink();

  const stats = await runEngine({ engine, events, sink, statsEvery: 0 });

  assert.equal(stats.eventsProcessed, 4);
  assert.equal(stats.suppressed, 1);
  assert.equal(stats.snapshotsEmitted, 3);
  assert.equal(stats.correctedSnapshots, 2);
  assert.equal(stats.biasEmitted, 2);
  assert.equal(stats.diagnosticsEmitted, 1);
  assert.equal(stats.sinkErrors, 0);
  assert.equal(stats.feedsTracked, 1);

  assert.deepEqual(
    sink.records.map((r) => `${r.feed}:${r.barIndex}:${r.kind}`),
    ["es:1:snapshot", "es:1:bias", "es:2:snapshot", "es:2:snapshot", "es:2:bias", "cl:2:diagnostic"],
  );
  assert.equal(sink.closed, true);
  assert.equal(events.closed, true);
});

test("runEngine keeps going when the sink fails", async () => {
  const { engine, events } = setup();
  const sink = new FailingSink();

  const stats = await runEngine({ engine, events, sink, statsEvery: 0 });

  assert.equal(stats.eventsProcessed, 4);
  assert.equal(stats.sinkErrors, 6);
  assert.equal(sink.attempts, 6);
  assert.equal(sink.closed, true);
});
