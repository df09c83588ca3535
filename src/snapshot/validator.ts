import { tickDecimals } from "../lib/types/feed.ts";
import type { CorrectedSnapshot, RawTriplet, ViolationKind } from "../lib/types/snapshot.ts";

export interface ValidatorOptions {
  /** Fraction of the band width used to pull an out-of-band reference back inside */
  insetFraction: number;
}

export const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = { insetFraction: 0.1 };

export type ValidationResult =
  | { valid: true; snapshot: CorrectedSnapshot }
  | { valid: false; reason: string };

// Corrected references are carried at least at the precision the records are written with
const PRECISION = 8;

/**
 * Round a corrected reference and keep it on the band, which may sit on a
 * grid finer than PRECISION
 */
function settle(value: number, lo: number, hi: number): number {
  const digits = Math.min(100, Math.max(PRECISION, tickDecimals(lo), tickDecimals(hi)));
  const rounded = Number(value.toFixed(digits));
  return Math.min(hi, Math.max(lo, rounded));
}

/**
 * Enforce lower <= reference <= upper on a normalized triplet.
 *
 * Checks run in a fixed order: positivity (no correction attempted), band
 * order (swap), then reference containment. An out-of-band reference is moved
 * just inside the crossed edge rather than to the band midpoint so the side it
 * came from stays visible to the bias generator.
 */
export function validateTriplet(
  triplet: RawTriplet,
  barIndex: number,
  options: ValidatorOptions = DEFAULT_VALIDATOR_OPTIONS,
): ValidationResult {
  const { reference, upper, lower } = triplet;
  if (!(reference > 0 && upper > 0 && lower > 0)) {
    return {
      valid: false,
      reason: `non-positive value (reference=${reference} upper=${upper} lower=${lower})`,
    };
  }

  const violations: ViolationKind[] = [];
  let hi = upper;
  let lo = lower;
  let ref = reference;

  if (hi < lo) {
    [hi, lo] = [lo, hi];
    violations.push("OrderInverted");
  }

  const width = hi - lo;
  if (ref < lo) {
    ref = settle(lo + options.insetFraction * width, lo, hi);
    violations.push("ReferenceBelowLower");
  } else if (ref > hi) {
    ref = settle(hi - options.insetFraction * width, lo, hi);
    violations.push("ReferenceAboveUpper");
  }

  return {
    valid: true,
    snapshot: {
      reference: ref,
      upper: hi,
      lower: lo,
      barIndex,
      corrected: violations.length > 0,
      violations,
    },
  };
}
