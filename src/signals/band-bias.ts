import type { BiasKind, CorrectedSnapshot } from "../lib/types/snapshot.ts";

export interface BandBiasResult {
  bias: BiasKind;
  targets: [primary: number, secondary: number];
  confidence: number; // 0.0 to 1.0
  reason: string;
}

export interface BandBiasConfig {
  tickSize: number;
}

/**
 * Classifies the last trade price against a corrected snapshot's band.
 *
 * Inside the band (edges included) confidence grows as price nears the
 * reference; outside it grows with the distance beyond the crossed edge,
 * measured in band widths. The reference is always the first target and the
 * crossed edge the second (a retest level).
 */
export class BandBias {
  readonly name = "band-bias";
  private readonly config: BandBiasConfig;

  constructor(config: BandBiasConfig) {
    this.config = config;
  }

  evaluate(snapshot: CorrectedSnapshot, lastPrice: number): BandBiasResult {
    const { reference, upper, lower } = snapshot;
    const range = Math.max(this.config.tickSize, upper - lower);

    if (lastPrice > upper) {
      const confidence = Math.min(1, Math.abs(lastPrice - upper) / range);
      return {
        bias: "BreakoutUp",
        targets: [reference, upper],
        confidence,
        reason: `price ${lastPrice} above upper ${upper}, retest ${upper}`,
      };
    }

    if (lastPrice < lower) {
      const confidence = Math.min(1, Math.abs(lastPrice - lower) / range);
      return {
        bias: "BreakoutDown",
        targets: [reference, lower],
        confidence,
        reason: `price ${lastPrice} below lower ${lower}, retest ${lower}`,
      };
    }

    const raw = 1 - Math.abs(lastPrice - reference) / (0.5 * range);
    const confidence = Math.min(1, Math.max(0, raw));
    return {
      bias: "InsideBand",
      targets: [reference, reference],
      confidence,
      reason: `price ${lastPrice} inside [${lower}, ${upper}], anchor ${reference}`,
    };
  }
}
