// bandwatch/src/runtime/sinks.ts
import { isoTimestamp, type EmittedRecord } from "../lib/types/snapshot.ts";
import type { EmissionSink } from "./interfaces.ts";

/**
 * One-line rendering of a record for logs
 */
export function formatRecord(record: EmittedRecord): string {
  const time = isoTimestamp(record.ts) ?? `ts=${record.ts}`;
  switch (record.kind) {
    case "snapshot": {
      const audit = record.corrected ? ` corrected=${record.violations.join("+")}` : "";
      return `[SNAP] ${time} feed=${record.feed} bar=${record.barIndex} scope=${record.scope} ` +
        `ref=${record.reference} upper=${record.upper} lower=${record.lower}${audit}`;
    }
    case "bias":
      return `[BIAS] ${time} feed=${record.feed} bar=${record.barIndex} price=${record.lastPrice} ` +
        `bias=${record.bias} targets=${record.targets.join("/")} confidence=${record.confidence.toFixed(2)}`;
    case "diagnostic": {
      const scope = record.scope ? ` scope=${record.scope}` : "";
      const detail = record.detail ? ` | ${record.detail}` : "";
      return `[DIAG] ${time} feed=${record.feed} bar=${record.barIndex} reason=${record.reason}${scope}${detail}`;
    }
  }
}

/**
 * Console emission sink for local runs.
 * Prints records to stdout.
 */
export class ConsoleEmissionSink implements EmissionSink {
  async publish(record: EmittedRecord): Promise<void> {
    console.log(formatRecord(record));
  }

  async close(): Promise<void> {
    // Nothing to close
  }
}

/**
 * Logging emission sink wrapper.
 * Logs records to console AND delegates to another sink.
 */
export class LoggingEmissionSink implements EmissionSink {
  constructor(private inner: EmissionSink) {}

  async publish(record: EmittedRecord): Promise<void> {
    if (record.kind === "diagnostic") {
      console.warn(formatRecord(record));
    } else {
      console.log(formatRecord(record));
    }
    await this.inner.publish(record);
  }

  async close(): Promise<void> {
    await this.inner.close();
  }
}

/**
 * Keeps every record in memory.
 */
export class MemoryEmissionSink implements EmissionSink {
  readonly records: EmittedRecord[] = [];
  closed = false;

  async publish(record: EmittedRecord): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
