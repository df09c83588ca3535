import { loadEngineConfig, SinkTypeEnum, type EngineConfig } from "../../config.ts";
import { SnapshotEngine } from "../../runtime/engine.ts";
import { FileReplaySource, JsonlEmissionSink } from "../../runtime/file.ts";
import type { EmissionSink } from "../../runtime/interfaces.ts";
import { NatsEmissionSink } from "../../runtime/nats.ts";
import { runEngine, type EngineStats } from "../../runtime/runner.ts";
import { ConsoleEmissionSink, LoggingEmissionSink } from "../../runtime/sinks.ts";
import { TablePrinter } from "../utils/table.ts";

/**
 * Parsed replay command arguments
 */
export interface ReplayArgs {
  barsPath: string;
  configPath?: string;
  sink?: EngineConfig["sink"]["type"];
  dir?: string;
}

export interface ReplayFlags {
  positionals: string[];
  config?: string;
  sink?: string;
  dir?: string;
}

export function parseReplayArgs(flags: ReplayFlags): ReplayArgs {
  const barsPath = flags.positionals[1];
  if (!barsPath) {
    throw new Error("Usage: bandwatch replay <bars.jsonl> [--config path] [--sink type] [--dir path]");
  }

  let sink: ReplayArgs["sink"];
  if (flags.sink !== undefined) {
    const parsed = SinkTypeEnum.safeParse(flags.sink);
    if (!parsed.success) {
      throw new Error(`Unknown sink: ${flags.sink} (expected console, jsonl or nats)`);
    }
    sink = parsed.data;
  }

  return { barsPath, configPath: flags.config, sink, dir: flags.dir };
}

/**
 * Build the configured emission sink
 */
export function createSink(config: EngineConfig["sink"]): EmissionSink {
  // Console output already shows every record
  if (config.type === "console") return new ConsoleEmissionSink();

  const sink: EmissionSink = config.type === "jsonl"
    ? new JsonlEmissionSink(config.dir)
    : new NatsEmissionSink(config.natsUrl, config.subjectPrefix);
  return config.logRecords ? new LoggingEmissionSink(sink) : sink;
}

export function printStats(stats: EngineStats): void {
  const elapsed = (Date.now() - stats.startTime) / 1000;
  console.log(`\nReplay finished in ${elapsed.toFixed(1)}s`);
  new TablePrinter()
    .header("METRIC", "VALUE")
    .align("left", "right")
    .row("events", stats.eventsProcessed)
    .row("snapshots", stats.snapshotsEmitted)
    .row("corrected", stats.correctedSnapshots)
    .row("bias", stats.biasEmitted)
    .row("diagnostics", stats.diagnosticsEmitted)
    .row("suppressed", stats.suppressed)
    .row("sink errors", stats.sinkErrors)
    .row("feeds", stats.feedsTracked)
    .flush();
}

export async function handleReplay(flags: ReplayFlags): Promise<EngineStats> {
  const args = parseReplayArgs(flags);
  const config = await loadEngineConfig(args.configPath);
  if (args.sink) config.sink.type = args.sink;
  if (args.dir) config.sink.dir = args.dir;

  const events = new FileReplaySource(args.barsPath);
  const engine = new SnapshotEngine({
    feeds: config.feeds,
    source: events.data,
    prices: events.data,
    validator: config.validator,
    seedPreviousFromHost: config.tracker.seedPreviousFromHost,
  });

  const stats = await runEngine({
    engine,
    events,
    sink: createSink(config.sink),
    statsEvery: config.reporting.statsEvery,
  });

  if (events.skipped > 0) {
    console.warn(`Skipped ${events.skipped} malformed bar line(s)`);
  }
  printStats(stats);
  return stats;
}
