import type { SnapshotEngine } from "./engine.ts";
import type { BarEventSource, EmissionSink } from "./interfaces.ts";

/**
 * Runtime statistics
 */
export interface EngineStats {
  eventsProcessed: number;
  snapshotsEmitted: number;
  correctedSnapshots: number;
  biasEmitted: number;
  diagnosticsEmitted: number;
  suppressed: number;
  sinkErrors: number;
  feedsTracked: number;
  startTime: number;
}

export interface RunnerConfig {
  engine: SnapshotEngine;
  events: BarEventSource;
  sink: EmissionSink;
  /** Log a progress line every N events (0 disables) */
  statsEvery?: number;
}

/**
 * Drive the engine from an event source, handing every record to the sink.
 * A failing sink is counted and logged but never stops the loop.
 */
export async function runEngine(config: RunnerConfig): Promise<EngineStats> {
  const stats: EngineStats = {
    eventsProcessed: 0,
    snapshotsEmitted: 0,
    correctedSnapshots: 0,
    biasEmitted: 0,
    diagnosticsEmitted: 0,
    suppressed: 0,
    sinkErrors: 0,
    feedsTracked: 0,
    startTime: Date.now(),
  };
  const statsEvery = config.statsEvery ?? 1000;
  const feeds = new Set<string>();

  console.log(`Starting snapshot engine: ${config.engine.feedIds().join(", ")}`);

  try {
    for await (const event of config.events.subscribe()) {
      stats.eventsProcessed++;

      const result = config.engine.process(event);
      if (result.status === "suppressed") stats.suppressed++;
      if (result.status === "accepted") feeds.add(result.feedId);

      for (const record of result.records) {
        if (record.kind === "snapshot") {
          stats.snapshotsEmitted++;
          if (record.corrected) stats.correctedSnapshots++;
        } else if (record.kind === "bias") {
          stats.biasEmitted++;
        } else {
          stats.diagnosticsEmitted++;
        }

        try {
          await config.sink.publish(record);
        } catch (e) {
          stats.sinkErrors++;
          if (stats.sinkErrors <= 10) {
            console.error(`Sink error for ${record.feed} bar ${record.barIndex}: ${e}`);
          }
        }
      }

      if (statsEvery > 0 && stats.eventsProcessed % statsEvery === 0) {
        const elapsed = (Date.now() - stats.startTime) / 1000;
        console.log(
          `Processed ${stats.eventsProcessed.toLocaleString()} events, ` +
          `${stats.snapshotsEmitted} snapshots (${stats.correctedSnapshots} corrected), ` +
          `${stats.diagnosticsEmitted} diagnostics (${elapsed.toFixed(1)}s)`
        );
      }
    }
  } finally {
    stats.feedsTracked = feeds.size;
    await config.events.close();
    await config.sink.close();
  }

  return stats;
}
