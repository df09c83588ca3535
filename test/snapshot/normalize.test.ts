import { test } from "node:test";
import assert from "node:assert/strict";
import { FeedSchema } from "../../src/lib/types/feed.ts";
import { normalizePrice, normalizeTriplet, roundToTick } from "../../src/snapshot/normalize.ts";

const es = FeedSchema.parse({ id: "es", symbol: "ESZ5", tickSize: 0.25 });

test("roundToTick snaps to nearest tick", () => {
  assert.equal(roundToTick(6430.6, 0.25), 6430.5);
  assert.equal(roundToTick(6430.9, 0.25), 6431);
  assert.equal(roundToTick(18.237, 0.01), 18.24);
});

test("normalizePrice rounds an in-range price", () => {
  assert.deepEqual(normalizePrice(6430.6, es), { ok: true, price: 6430.5, rescaled: false, raw: 6430.6 });
});

test("normalizePrice rescales once above threshold", () => {
  assert.deepEqual(normalizePrice(643075, es), { ok: true, price: 6430.75, rescaled: true, raw: 643075 });
});

test("normalizePrice leaves large prices alone when rescale is disabled", () => {
  const feed = FeedSchema.parse({ id: "nq", symbol: "NQ", tickSize: 0.25, rescale: { enabled: false } });
  assert.deepEqual(normalizePrice(643075, feed), { ok: true, price: 643075, rescaled: false, raw: 643075 });
});

test("normalizePrice divides by the host price multiplier first", () => {
  const feed = FeedSchema.parse({ id: "es", symbol: "ES", tickSize: 0.25, priceMultiplier: 100 });
  assert.deepEqual(normalizePrice(643075, feed), { ok: true, price: 6430.75, rescaled: false, raw: 643075 });
});

test("normalizePrice rejects zero, negative and sub-tick prices", () => {
  assert.deepEqual(normalizePrice(0, es), { ok: false, reason: "non_positive", raw: 0 });
  assert.deepEqual(normalizePrice(-5, es), { ok: false, reason: "non_positive", raw: -5 });
  assert.deepEqual(normalizePrice(0.1, es), { ok: false, reason: "non_positive", raw: 0.1 });
});

test("normalizePrice rejects non-finite prices", () => {
  const result = normalizePrice(Number.NaN, es);
  assert.equal(result.ok, false);
  assert.equal(result.ok ? "" : result.reason, "non_finite");
  assert.equal(normalizePrice(Infinity, es).ok, false);
});

test("normalizeTriplet reports rescaled fields", () => {
  const result = normalizeTriplet({ reference: 644000, upper: 6454, lower: 6430 }, es);
  assert.deepEqual(result, {
    ok: true,
    triplet: { reference: 6440, upper: 6454, lower: 6430 },
    rescaled: ["reference"],
  });
});

test("normalizeTriplet fails on the first unusable field", () => {
  const result = normalizeTriplet({ reference: 6440, upper: 6454, lower: -1 }, es);
  assert.deepEqual(result, { ok: false, field: "lower", reason: "non_positive", raw: -1 });
});
