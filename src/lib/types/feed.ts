// Feed types and Zod schemas
import { z } from "zod";

export const FeedKindEnum = z.enum(["future", "index", "equity", "volatility"]);

// Guard against the host occasionally delivering prices scaled x100
export const RescaleSchema = z.object({
  enabled: z.boolean().default(true),
  threshold: z.number().positive().default(10000),
  factor: z.number().positive().default(100),
});

export const FeedSchema = z.object({
  id: z.string().min(1, "Feed id is required"),
  symbol: z.string().min(1, "Feed symbol is required"),
  kind: FeedKindEnum.default("future"),
  tickSize: z.number().positive("tickSize must be positive"),
  priceMultiplier: z.number().positive().default(1),
  rescale: RescaleSchema.default({}),
});

export type FeedKind = z.infer<typeof FeedKindEnum>;
export type Rescale = z.infer<typeof RescaleSchema>;
export type Feed = z.infer<typeof FeedSchema>;

/**
 * Number of decimals needed to print a multiple of the tick size exactly
 */
export function tickDecimals(tickSize: number): number {
  const [mantissa, exponent] = tickSize.toString().split("e");
  const dot = mantissa.indexOf(".");
  const fraction = dot === -1 ? 0 : mantissa.length - dot - 1;
  return Math.max(0, fraction - Number(exponent ?? 0));
}
