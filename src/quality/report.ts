// Quality summary over an emitted record stream
import { z } from "zod";
import type {
  BiasKind,
  DiagnosticReason,
  EmittedRecord,
  ViolationKind,
} from "../lib/types/snapshot.ts";
import { readJsonlLines } from "../runtime/file.ts";

export interface FeedQuality {
  feed: string;
  currentSnapshots: number;
  previousSnapshots: number;
  correctedSnapshots: number;
  violations: Record<ViolationKind, number>;
  diagnostics: Partial<Record<DiagnosticReason, number>>;
  bias: Record<BiasKind, number>;
  meanConfidence: number;
  /** Snapshot records where lower <= reference <= upper does not hold */
  invariantBreaches: number;
  firstBar: number | null;
  lastBar: number | null;
}

function emptyQuality(feed: string): FeedQuality {
  return {
    feed,
    currentSnapshots: 0,
    previousSnapshots: 0,
    correctedSnapshots: 0,
    violations: { OrderInverted: 0, ReferenceBelowLower: 0, ReferenceAboveUpper: 0 },
    diagnostics: {},
    bias: { InsideBand: 0, BreakoutUp: 0, BreakoutDown: 0 },
    meanConfidence: 0,
    invariantBreaches: 0,
    firstBar: null,
    lastBar: null,
  };
}

/**
 * Per-feed counts over a record stream, ordered by feed id.
 */
export function summarizeRecords(records: Iterable<EmittedRecord>): FeedQuality[] {
  const byFeed = new Map<string, FeedQuality>();
  const confidenceSums = new Map<string, number>();

  for (const record of records) {
    let q = byFeed.get(record.feed);
    if (!q) {
      q = emptyQuality(record.feed);
      byFeed.set(record.feed, q);
    }

    q.firstBar = q.firstBar === null ? record.barIndex : Math.min(q.firstBar, record.barIndex);
    q.lastBar = q.lastBar === null ? record.barIndex : Math.max(q.lastBar, record.barIndex);

    switch (record.kind) {
      case "snapshot":
        if (record.scope === "current") q.currentSnapshots++;
        else q.previousSnapshots++;
        if (record.corrected) q.correctedSnapshots++;
        for (const v of record.violations) q.violations[v]++;
        if (!(record.lower <= record.reference && record.reference <= record.upper)) {
          q.invariantBreaches++;
        }
        break;
      case "diagnostic":
        q.diagnostics[record.reason] = (q.diagnostics[record.reason] ?? 0) + 1;
        break;
      case "bias":
        q.bias[record.bias]++;
        confidenceSums.set(record.feed, (confidenceSums.get(record.feed) ?? 0) + record.confidence);
        break;
    }
  }

  for (const q of byFeed.values()) {
    const count = q.bias.InsideBand + q.bias.BreakoutUp + q.bias.BreakoutDown;
    q.meanConfidence = count > 0 ? (confidenceSums.get(q.feed) ?? 0) / count : 0;
  }

  return [...byFeed.values()].sort((a, b) => a.feed.localeCompare(b.feed));
}

const ViolationEnum = z.enum(["OrderInverted", "ReferenceBelowLower", "ReferenceAboveUpper"]);
const ScopeEnum = z.enum(["current", "previous"]);

export const EmittedRecordSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("snapshot"),
    feed: z.string(),
    ts: z.number(),
    barIndex: z.number(),
    scope: ScopeEnum,
    reference: z.number(),
    upper: z.number(),
    lower: z.number(),
    corrected: z.boolean(),
    violations: z.array(ViolationEnum),
  }),
  z.object({
    kind: z.literal("diagnostic"),
    feed: z.string(),
    ts: z.number(),
    barIndex: z.number(),
    reason: z.enum([
      "source_unavailable",
      "bounds_exhausted",
      "invalid_triplet",
      "price_unavailable",
      "price_rescaled",
    ]),
    scope: ScopeEnum.optional(),
    detail: z.string().optional(),
  }),
  z.object({
    kind: z.literal("bias"),
    feed: z.string(),
    ts: z.number(),
    barIndex: z.number(),
    lastPrice: z.number(),
    bias: z.enum(["InsideBand", "BreakoutUp", "BreakoutDown"]),
    targets: z.tuple([z.number(), z.number()]),
    confidence: z.number(),
  }),
]);

export interface ParsedRecords {
  records: EmittedRecord[];
  rejected: number;
}

export function parseRecordLines(lines: string[]): ParsedRecords {
  const records: EmittedRecord[] = [];
  let rejected = 0;

  for (const line of lines) {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      rejected++;
      continue;
    }
    const result = EmittedRecordSchema.safeParse(raw);
    if (result.success) {
      records.push(result.data);
    } else {
      rejected++;
    }
  }

  return { records, rejected };
}

/**
 * Read a JSONL record file written by JsonlEmissionSink
 */
export async function readRecordsFile(path: string): Promise<ParsedRecords> {
  return parseRecordLines(await readJsonlLines(path));
}
