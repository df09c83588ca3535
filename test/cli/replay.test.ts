import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createSink, handleReplay, parseReplayArgs } from "../../src/cli/commands/replay.ts";
import { handleQuality } from "../../src/cli/commands/quality.ts";
import { parseEngineConfig } from "../../src/config.ts";
import { JsonlEmissionSink } from "../../src/runtime/file.ts";
import { ConsoleEmissionSink, LoggingEmissionSink } from "../../src/runtime/sinks.ts";

const SINK_DEFAULTS = parseEngineConfig({ feeds: [{ id: "es", symbol: "ES", tickSize: 0.25 }] }).sink;

test("parseReplayArgs reads the bars path and overrides", () => {
  assert.deepEqual(
    parseReplayArgs({ positionals: ["replay", "bars.jsonl"], config: "cfg.yaml", sink: "jsonl", dir: "out" }),
    { barsPath: "bars.jsonl", configPath: "cfg.yaml", sink: "jsonl", dir: "out" },
  );
});

test("parseReplayArgs requires a bars file", () => {
  assert.throws(() => parseReplayArgs({ positionals: ["replay"] }), /Usage: bandwatch replay/);
});

test("parseReplayArgs rejects an unknown sink", () => {
  assert.throws(
    () => parseReplayArgs({ positionals: ["replay", "bars.jsonl"], sink: "kafka" }),
    /Unknown sink: kafka/,
  );
});

test("createSink builds the configured sink", () => {
  assert.ok(createSink(SINK_DEFAULTS) instanceof ConsoleEmissionSink);
  assert.ok(createSink({ ...SINK_DEFAULTS, type: "jsonl" }) instanceof JsonlEmissionSink);
  assert.ok(createSink({ ...SINK_DEFAULTS, type: "jsonl", logRecords: true }) instanceof LoggingEmissionSink);
});

test("replay writes records that the quality report reads back", async () => {
  const dir = await mkdtemp(join(tmpdir(), "bandwatch-replay-"));
  try {
    const configPath = join(dir, "bandwatch.yaml");
    await writeFile(configPath, [
      "feeds:",
      "  - { id: es, symbol: ESZ5, tickSize: 0.25 }",
      "  - { id: nq, symbol: NQZ5, tickSize: 0.25 }",
      "reporting:",
      "  statsEvery: 0",
      "",
    ].join("\n"));

    const barsPath = join(dir, "bars.jsonl");
    await writeFile(barsPath, [
      JSON.stringify({ feed: "es", barIndex: 1, ts: 1750000000, reference: 6440, upper: 6430.75, lower: 6454, lastPrice: 6445 }),
      JSON.stringify({ feed: "es", barIndex: 1, ts: 1750000000, reference: 6440, upper: 6430.75, lower: 6454, lastPrice: 6445 }),
      JSON.stringify({ feed: "es", barIndex: 2, ts: 1750000060, reference: 6500, upper: 6454, lower: 6430, lastPrice: 6460 }),
      "not json",
      JSON.stringify({ feed: "nq", barIndex: 1, ts: 1750000000, reference: 0, upper: 23050, lower: 22990 }),
    ].join("\n"));

    const outDir = join(dir, "records");
    const stats = await handleReplay({
      positionals: ["replay", barsPath],
      config: configPath,
      sink: "jsonl",
      dir: outDir,
    });

    assert.equal(stats.eventsProcessed, 4);
    assert.equal(stats.suppressed, 1);
    assert.equal(stats.snapshotsEmitted, 3);
    assert.equal(stats.correctedSnapshots, 3);
    assert.equal(stats.biasEmitted, 2);
    assert.equal(stats.diagnosticsEmitted, 1);
    assert.equal(stats.feedsTracked, 1);

    const nqLines = (await readFile(join(outDir, "nq", "2025-06-15.jsonl"), "utf8")).trim().split("\n");
    assert.deepEqual(JSON.parse(nqLines[0]), {
      kind: "diagnostic",
      feed: "nq",
      ts: 1750000000,
      barIndex: 1,
      reason: "invalid_triplet",
      scope: "current",
      detail: "reference non_positive (0)",
    });

    const [es] = await handleQuality(["quality", join(outDir, "es", "2025-06-15.jsonl")]);
    assert.equal(es.currentSnapshots, 2);
    assert.equal(es.previousSnapshots, 1);
    assert.equal(es.correctedSnapshots, 3);
    assert.deepEqual(es.violations, { OrderInverted: 2, ReferenceBelowLower: 0, ReferenceAboveUpper: 1 });
    assert.deepEqual(es.bias, { InsideBand: 1, BreakoutUp: 1, BreakoutDown: 0 });
    assert.equal(es.invariantBreaches, 0);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("handleQuality requires a records file", async () => {
  await assert.rejects(() => handleQuality(["quality"]), /Usage: bandwatch quality/);
});
