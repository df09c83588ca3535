import { tickDecimals, type Feed } from "../lib/types/feed.ts";
import type { RawTriplet } from "../lib/types/snapshot.ts";

export type NormalizedPrice =
  | { ok: true; price: number; rescaled: boolean; raw: number }
  | { ok: false; reason: "non_finite" | "non_positive"; raw: number };

export type NormalizedTriplet =
  | { ok: true; triplet: RawTriplet; rescaled: (keyof RawTriplet)[] }
  | { ok: false; field: keyof RawTriplet; reason: "non_finite" | "non_positive"; raw: number };

/**
 * Round a price to the nearest multiple of the tick size.
 */
export function roundToTick(price: number, tickSize: number): number {
  const ticks = Math.round(price / tickSize);
  return Number((ticks * tickSize).toFixed(tickDecimals(tickSize)));
}

/**
 * Map a raw host price onto the feed's tick grid.
 * Prices above the feed's rescale threshold are divided once by the rescale
 * factor before rounding; the caller is told so it can report it.
 */
export function normalizePrice(raw: number, feed: Feed): NormalizedPrice {
  if (!Number.isFinite(raw)) return { ok: false, reason: "non_finite", raw };

  let px = raw / feed.priceMultiplier;
  let rescaled = false;

  if (feed.rescale.enabled && px > feed.rescale.threshold) {
    px /= feed.rescale.factor;
    rescaled = true;
  }

  px = roundToTick(px, feed.tickSize);
  if (px <= 0) return { ok: false, reason: "non_positive", raw };

  return { ok: true, price: px, rescaled, raw };
}

const FIELDS: (keyof RawTriplet)[] = ["reference", "upper", "lower"];

export function normalizeTriplet(raw: RawTriplet, feed: Feed): NormalizedTriplet {
  const triplet: RawTriplet = { reference: 0, upper: 0, lower: 0 };
  const rescaled: (keyof RawTriplet)[] = [];

  for (const field of FIELDS) {
    const result = normalizePrice(raw[field], feed);
    if (!result.ok) {
      return { ok: false, field, reason: result.reason, raw: result.raw };
    }
    triplet[field] = result.price;
    if (result.rescaled) rescaled.push(field);
  }

  return { ok: true, triplet, rescaled };
}
