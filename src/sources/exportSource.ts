import { normalizeDate, type DateFormatId } from "../journal/dates.js";
import type { DatedRecord, RecordPayloads, SourceKind } from "../journal/types.js";
import { errorMessage, logger } from "../logger.js";
import { readExport, removeExport } from "./files.js";
import { sourceFailure, type RecordSource, type SourceOutcome } from "./types.js";

export type ParsedRecords<K extends SourceKind> =
  | { ok: true; records: Array<DatedRecord<K>>; dropped: number }
  | { ok: false; message: string };

export type ExportSourceOptions<K extends SourceKind> = {
  kind: K;
  name: string;
  filePath: string | undefined;
  parse: (text: string) => ParsedRecords<K>;
  /** Allow `cleanup()` to delete the export. */
  removable?: boolean;
  /** A missing file means the source is off rather than failing. */
  missingIsUnconfigured?: boolean;
};

/** A source read from a file the user exported from some service. */
export function createExportSource<K extends SourceKind>(opts: ExportSourceOptions<K>): RecordSource<K> {
  const source: RecordSource<K> = {
    kind: opts.kind,
    name: opts.name,
    async collect(): Promise<SourceOutcome<K>> {
      const read = await readExport(opts.filePath, opts.name);
      if (!read.ok) {
        if (read.reason === "not_found" && opts.missingIsUnconfigured) {
          return sourceFailure("not_configured", `${opts.name} has no export at ${opts.filePath}`);
        }
        return sourceFailure(read.reason, read.message);
      }

      let parsed: ParsedRecords<K>;
      try {
        parsed = opts.parse(read.text);
      } catch (err) {
        parsed = { ok: false, message: errorMessage(err) };
      }
      if (!parsed.ok) return sourceFailure("malformed", `${opts.name}: ${parsed.message}`);
      return { ok: true, records: parsed.records, dropped: parsed.dropped };
    }
  };

  if (opts.removable) {
    source.cleanup = () => removeExport(opts.filePath);
  }
  return source;
}

/**
 * Accumulates dated records for one source. Rows whose date cannot be
 * normalized are counted as dropped.
 */
export class RecordCollector<K extends SourceKind> {
  readonly records: Array<DatedRecord<K>> = [];
  dropped = 0;

  constructor(
    private readonly kind: K,
    private readonly name: string,
    private readonly formats: readonly DateFormatId[]
  ) {}

  add(rawDate: string | undefined, payload: RecordPayloads[K]): void {
    const result = normalizeDate(rawDate, this.formats);
    if (!result.ok) {
      this.drop("invalid_date", { raw: result.raw });
      return;
    }
    this.records.push({ date: result.date, kind: this.kind, payload });
  }

  drop(reason: string, meta?: Record<string, unknown>): void {
    this.dropped += 1;
    logger.debug("source.row.dropped", { source: this.name, reason, ...meta });
  }

  result(): ParsedRecords<K> {
    return { ok: true, records: this.records, dropped: this.dropped };
  }
}
