import type { DatedRecord, SourceKind } from "../journal/types.js";

/**
 * Expected reasons a source produces nothing this run:
 * - not_configured: no path/endpoint/key set
 * - not_found: the export file is missing
 * - unavailable: network or filesystem failure
 * - malformed: the payload does not have the expected shape
 */
export type SourceFailureReason = "not_configured" | "not_found" | "unavailable" | "malformed";

export type SourceOutcome<K extends SourceKind> =
  | { ok: true; records: Array<DatedRecord<K>>; dropped: number }
  | { ok: false; reason: SourceFailureReason; message: string };

export interface RecordSource<K extends SourceKind> {
  readonly kind: K;
  readonly name: string;
  collect(): Promise<SourceOutcome<K>>;
  /** Removes the upstream export once its records have been written. */
  cleanup?(): Promise<boolean>;
}

export type AnyRecordSource = { [K in SourceKind]: RecordSource<K> }[SourceKind];

export function sourceFailure<K extends SourceKind>(
  reason: SourceFailureReason,
  message: string
): SourceOutcome<K> {
  return { ok: false, reason, message };
}
