import { groupByDate, sortedDates } from "../journal/buckets.js";
import { ensureSection } from "../journal/engine.js";
import { indexJournalFiles, resolveJournalPath } from "../journal/paths.js";
import type { CanonicalDate, SectionResult, SourceKind } from "../journal/types.js";
import { errorMessage, logger } from "../logger.js";
import { renderSection } from "../render/index.js";
import type { AnyRecordSource, RecordSource, SourceFailureReason, SourceOutcome } from "../sources/types.js";

export type PipelineOptions = {
  targetDir: string;
  runDate: CanonicalDate;
  /** When false, only dates that already have a journal file are written. */
  createMissing: boolean;
  /** Delete a file export once its import wrote at least one section. */
  deleteAfterProcessing: boolean;
};

export type SectionCounts = {
  created: number;
  appended: number;
  skipped: number;
  failed: number;
  dropped: number;
};

export type SourceSummary = SectionCounts & {
  kind: SourceKind;
  source: string;
  status: "ok" | SourceFailureReason;
  message?: string;
  records: number;
  dates: number;
  /** Dates left out because no journal file exists and creation is off. */
  withoutJournal: number;
  exportDeleted?: boolean;
};

export type RunSummary = {
  runDate: CanonicalDate;
  sources: SourceSummary[];
  totals: SectionCounts;
  failedSources: string[];
};

function emptyCounts(): SectionCounts {
  return { created: 0, appended: 0, skipped: 0, failed: 0, dropped: 0 };
}

function tally(counts: SectionCounts, result: SectionResult): void {
  switch (result.status) {
    case "created":
      counts.created += 1;
      break;
    case "appended":
      counts.appended += 1;
      break;
    case "skipped":
      counts.skipped += 1;
      break;
    case "failed":
      counts.failed += 1;
      break;
  }
}

/**
 * Runs sources one after another and merges their records into the journal.
 * A failing source, date, or section never stops the others.
 */
export class JournalPipeline {
  constructor(private readonly options: PipelineOptions) {}

  async run(sources: readonly AnyRecordSource[]): Promise<RunSummary> {
    const existing = this.options.createMissing ? null : await indexJournalFiles(this.options.targetDir);

    const summaries: SourceSummary[] = [];
    for (const source of sources) {
      summaries.push(await this.runSource(source, existing));
    }

    const totals = emptyCounts();
    for (const s of summaries) {
      totals.created += s.created;
      totals.appended += s.appended;
      totals.skipped += s.skipped;
      totals.failed += s.failed;
      totals.dropped += s.dropped;
    }

    return {
      runDate: this.options.runDate,
      sources: summaries,
      totals,
      // Unconfigured sources are simply off, not failures.
      failedSources: summaries.filter((s) => s.status !== "ok" && s.status !== "not_configured").map((s) => s.source)
    };
  }

  private async collect<K extends SourceKind>(source: RecordSource<K>): Promise<SourceOutcome<K>> {
    try {
      return await source.collect();
    } catch (err) {
      return { ok: false, reason: "unavailable", message: errorMessage(err) };
    }
  }

  private async runSource<K extends SourceKind>(
    source: RecordSource<K>,
    existing: Map<CanonicalDate, string> | null
  ): Promise<SourceSummary> {
    const log = logger.child(source.name);
    const summary: SourceSummary = {
      kind: source.kind,
      source: source.name,
      status: "ok",
      records: 0,
      dates: 0,
      withoutJournal: 0,
      ...emptyCounts()
    };

    const outcome = await this.collect(source);
    if (!outcome.ok) {
      summary.status = outcome.reason;
      summary.message = outcome.message;
      const level = outcome.reason === "not_configured" ? "info" : "warn";
      log[level]("journal.source.skipped", { kind: source.kind, reason: outcome.reason, message: outcome.message });
      return summary;
    }

    summary.records = outcome.records.length;
    summary.dropped = outcome.dropped;
    if (outcome.dropped > 0) {
      log.info("journal.source.dropped_rows", { kind: source.kind, dropped: outcome.dropped });
    }

    const bucket = groupByDate(outcome.records);
    const dates = sortedDates(bucket);
    summary.dates = dates.length;

    for (const date of dates) {
      const payloads = bucket.get(date);
      if (!payloads || payloads.length === 0) continue;

      let filePath: string;
      if (existing) {
        const found = existing.get(date);
        if (found === undefined) {
          summary.withoutJournal += 1;
          log.debug("journal.date.no_file", { date });
          continue;
        }
        filePath = found;
      } else {
        filePath = resolveJournalPath(date, this.options.targetDir);
      }

      let result: SectionResult;
      try {
        const section = renderSection(source.kind, payloads, { runDate: this.options.runDate });
        result = await ensureSection(filePath, section.marker, section.body);
      } catch (err) {
        result = { status: "failed", reason: "io_error", message: errorMessage(err) };
      }

      tally(summary, result);
      if (result.status === "failed") {
        log.warn("journal.section.failed", { date, filePath, reason: result.reason, error: result.message });
      } else {
        log.info(`journal.section.${result.status}`, { date, filePath });
      }
    }

    if (this.options.deleteAfterProcessing && source.cleanup && summary.created + summary.appended > 0) {
      summary.exportDeleted = await source.cleanup();
    }

    log.info("journal.source.done", {
      kind: source.kind,
      created: summary.created,
      appended: summary.appended,
      skipped: summary.skipped,
      failed: summary.failed,
      dropped: summary.dropped
    });
    return summary;
  }
}
