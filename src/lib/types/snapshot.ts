// Snapshot, bias and emitted record types

export type Scope = "current" | "previous";

export type ViolationKind =
  | "OrderInverted"
  | "ReferenceBelowLower"
  | "ReferenceAboveUpper";

export type BiasKind = "InsideBand" | "BreakoutUp" | "BreakoutDown";

export type DiagnosticReason =
  | "source_unavailable"
  | "bounds_exhausted"
  | "invalid_triplet"
  | "price_unavailable"
  | "price_rescaled";

/** Triplet as read from the host for one bar and scope */
export interface RawTriplet {
  reference: number;
  upper: number;
  lower: number;
}

/** Triplet after validation; lower <= reference <= upper always holds */
export interface CorrectedSnapshot {
  reference: number;
  upper: number;
  lower: number;
  barIndex: number;
  corrected: boolean;
  violations: ViolationKind[];
}

export interface SnapshotRecord {
  kind: "snapshot";
  feed: string;
  ts: number;
  barIndex: number;
  scope: Scope;
  reference: number;
  upper: number;
  lower: number;
  corrected: boolean;
  violations: ViolationKind[];
}

export interface DiagnosticRecord {
  kind: "diagnostic";
  feed: string;
  ts: number;
  barIndex: number;
  reason: DiagnosticReason;
  scope?: Scope;
  detail?: string;
}

export interface BiasRecord {
  kind: "bias";
  feed: string;
  ts: number;
  barIndex: number;
  lastPrice: number;
  bias: BiasKind;
  targets: [primary: number, secondary: number];
  confidence: number;
}

export type EmittedRecord = SnapshotRecord | DiagnosticRecord | BiasRecord;

export function toSnapshotRecord(
  feed: string,
  ts: number,
  scope: Scope,
  snapshot: CorrectedSnapshot,
): SnapshotRecord {
  return {
    kind: "snapshot",
    feed,
    ts,
    barIndex: snapshot.barIndex,
    scope,
    reference: snapshot.reference,
    upper: snapshot.upper,
    lower: snapshot.lower,
    corrected: snapshot.corrected,
    violations: [...snapshot.violations],
  };
}

/**
 * True when two snapshots carry the same prices (bar index and audit are ignored)
 */
export function samePrices(a: RawTriplet, b: RawTriplet): boolean {
  return a.reference === b.reference && a.upper === b.upper && a.lower === b.lower;
}

// Latest Unix-seconds timestamp a Date can hold
export const MAX_RECORD_TS = 8.64e12;

/**
 * ISO-8601 rendering of a Unix-seconds timestamp, null when out of Date range
 */
export function isoTimestamp(ts: number): string | null {
  if (!Number.isFinite(ts) || Math.abs(ts) > MAX_RECORD_TS) return null;
  return new Date(ts * 1000).toISOString();
}
