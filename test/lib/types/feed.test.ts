import { test } from "node:test";
import assert from "node:assert/strict";
import { FeedSchema, tickDecimals } from "../../../src/lib/types/feed.ts";

test("FeedSchema applies defaults", () => {
  const feed = FeedSchema.parse({ id: "es", symbol: "ESZ5", tickSize: 0.25 });
  assert.equal(feed.kind, "future");
  assert.equal(feed.priceMultiplier, 1);
  assert.deepEqual(feed.rescale, { enabled: true, threshold: 10000, factor: 100 });
});

test("FeedSchema keeps explicit rescale settings", () => {
  const feed = FeedSchema.parse({
    id: "vix",
    symbol: "VIX",
    kind: "volatility",
    tickSize: 0.01,
    rescale: { threshold: 500 },
  });
  assert.equal(feed.kind, "volatility");
  assert.deepEqual(feed.rescale, { enabled: true, threshold: 500, factor: 100 });
});

test("FeedSchema rejects non-positive tick size", () => {
  assert.throws(() => FeedSchema.parse({ id: "es", symbol: "ES", tickSize: 0 }));
});

test("FeedSchema rejects empty id", () => {
  assert.throws(() => FeedSchema.parse({ id: "", symbol: "ES", tickSize: 0.25 }));
});

test("FeedSchema rejects unknown kind", () => {
  assert.throws(() => FeedSchema.parse({ id: "es", symbol: "ES", kind: "bond", tickSize: 0.25 }));
});

test("tickDecimals counts fractional digits", () => {
  assert.equal(tickDecimals(0.25), 2);
  assert.equal(tickDecimals(1), 0);
  assert.equal(tickDecimals(0.005), 3);
  assert.equal(tickDecimals(1e-7), 7);
});

test("tickDecimals counts mantissa decimals on exponent-form ticks", () => {
  assert.equal(tickDecimals(1.5e-7), 8);
  assert.equal(tickDecimals(2.5e-10), 11);
  assert.equal(tickDecimals(1e21), 0);
});
