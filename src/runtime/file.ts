// bandwatch/src/runtime/file.ts
import { appendFile, mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { z } from "zod";
import { isoTimestamp, MAX_RECORD_TS, type EmittedRecord } from "../lib/types/snapshot.ts";
import type { BarCloseEvent, BarEventSource, EmissionSink } from "./interfaces.ts";
import { MemoryMarketData } from "./memory.ts";

const TripletSchema = z.object({
  reference: z.number(),
  upper: z.number(),
  lower: z.number(),
});

/**
 * One bar in a replay file
 */
export const ReplayLineSchema = TripletSchema.extend({
  feed: z.string().min(1),
  barIndex: z.number().int().nonnegative(),
  ts: z.number().nonnegative().max(MAX_RECORD_TS),
  lastPrice: z.number().optional(),
  previous: TripletSchema.optional(),
});

export type ReplayLine = z.infer<typeof ReplayLineSchema>;

/**
 * Read a .jsonl or .jsonl.gz file into non-empty lines
 */
export async function readJsonlLines(path: string): Promise<string[]> {
  const bytes = await readFile(path);
  const text = path.endsWith(".gz")
    ? gunzipSync(bytes).toString("utf8")
    : bytes.toString("utf8");
  return text.split("\n").map((l) => l.trim()).filter(Boolean);
}

/**
 * Replays recorded bars as if a charting host were closing them.
 * Each line is written into `data` before its event is yielded, so the
 * source range grows bar by bar the way a live host's arrays do.
 */
export class FileReplaySource implements BarEventSource {
  readonly data = new MemoryMarketData();
  skipped = 0;
  private closed = false;

  constructor(private path: string) {}

  async *subscribe(): AsyncIterable<BarCloseEvent> {
    const lines = await readJsonlLines(this.path);
    console.log(`Replaying ${lines.length} bars from ${this.path}`);

    for (const [n, line] of lines.entries()) {
      if (this.closed) break;

      const bar = parseReplayLine(line);
      if (!bar) {
        this.skipped++;
        if (this.skipped <= 10) console.warn(`Skipping malformed bar on line ${n + 1}`);
        continue;
      }

      const { reference, upper, lower } = bar;
      this.data.setTriplet(bar.feed, bar.barIndex, { reference, upper, lower });
      if (bar.previous) this.data.setTriplet(bar.feed, bar.barIndex, bar.previous, "previous");
      if (bar.lastPrice !== undefined) this.data.setLastPrice(bar.feed, bar.lastPrice);

      yield { feedId: bar.feed, barIndex: bar.barIndex, ts: bar.ts };
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function parseReplayLine(line: string): ReplayLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const result = ReplayLineSchema.safeParse(raw);
  return result.success ? result.data : null;
}

/**
 * UTC day of a Unix-seconds timestamp, YYYY-MM-DD
 */
export function recordDate(ts: number): string {
  return isoTimestamp(ts)?.split("T")[0] ?? "undated";
}

/**
 * Directory name for a feed id; path separators and dots become "_" so a
 * record can never leave the sink directory
 */
export function feedDirName(feed: string): string {
  return feed.replace(/[\\/.]+/g, "_") || "_";
}

/**
 * Appends records as JSON lines to <dir>/<feed>/<YYYY-MM-DD>.jsonl, with the
 * feed id passed through feedDirName.
 */
export class JsonlEmissionSink implements EmissionSink {
  private created = new Set<string>();

  constructor(private dir: string) {}

  pathFor(record: EmittedRecord): string {
    return join(this.dir, feedDirName(record.feed), `${recordDate(record.ts)}.jsonl`);
  }

  async publish(record: EmittedRecord): Promise<void> {
    const feedDir = join(this.dir, feedDirName(record.feed));
    if (!this.created.has(feedDir)) {
      await mkdir(feedDir, { recursive: true });
      this.created.add(feedDir);
    }
    await appendFile(this.pathFor(record), JSON.stringify(record) + "\n");
  }

  async close(): Promise<void> {
    this.created.clear();
  }
}
