import { readRecordsFile, summarizeRecords, type FeedQuality } from "../../quality/report.ts";
import { TablePrinter } from "../utils/table.ts";

/**
 * Render per-feed quality rows
 */
export function qualityTable(rows: FeedQuality[]): TablePrinter {
  const table = new TablePrinter()
    .header("FEED", "BARS", "CURRENT", "PREVIOUS", "CORRECTED", "INVERTED", "BELOW", "ABOVE", "DIAG", "BREACHES", "CONF")
    .align("left", "left", "right", "right", "right", "right", "right", "right", "right", "right", "right");

  for (const q of rows) {
    const diagnostics = Object.values(q.diagnostics).reduce((a, b) => a + b, 0);
    const bars = q.firstBar === null ? "-" : `${q.firstBar}-${q.lastBar}`;
    table.row(
      q.feed,
      bars,
      q.currentSnapshots,
      q.previousSnapshots,
      q.correctedSnapshots,
      q.violations.OrderInverted,
      q.violations.ReferenceBelowLower,
      q.violations.ReferenceAboveUpper,
      diagnostics,
      q.invariantBreaches,
      q.meanConfidence.toFixed(2),
    );
  }
  return table;
}

export async function handleQuality(positionals: string[]): Promise<FeedQuality[]> {
  const path = positionals[1];
  if (!path) {
    throw new Error("Usage: bandwatch quality <records.jsonl>");
  }

  const { records, rejected } = await readRecordsFile(path);
  const rows = summarizeRecords(records);

  if (rows.length === 0) {
    console.log("No records found.");
  } else {
    qualityTable(rows).flush();
  }
  if (rejected > 0) {
    console.warn(`\n${rejected} line(s) were not valid records`);
  }

  const breaches = rows.reduce((n, q) => n + q.invariantBreaches, 0);
  if (breaches > 0) {
    console.warn(`${breaches} snapshot record(s) break lower <= reference <= upper`);
  }
  return rows;
}
