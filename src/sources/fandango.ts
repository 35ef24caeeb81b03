import os from "node:os";
import path from "node:path";
import { parseCsvRecords } from "./csv.js";
import { RecordCollector, createExportSource, type ParsedRecords } from "./exportSource.js";
import type { RecordSource } from "./types.js";

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Fandango purchase history: `Movie`, `Date`, `Theater`, `Address`. Dates
 * come as `Monday, Mar 9 2020 at 2:15 PM`, `March 9, 2020` or slash forms.
 */
export function parseFandangoHistory(text: string): ParsedRecords<"purchase"> {
  const rows = parseCsvRecords(text);
  const [first] = rows;
  if (first && !("Movie" in first && "Date" in first)) {
    return { ok: false, message: "expected 'Movie' and 'Date' columns" };
  }

  const collector = new RecordCollector("purchase", "fandango", [
    "iso",
    "us-long",
    "us-short",
    "weekday-at",
    "month-day-year"
  ]);
  for (const row of rows) {
    collector.add(row.Date, {
      movieName: row.Movie?.trim() ?? "",
      theaterName: optional(row.Theater),
      theaterAddress: optional(row.Address)
    });
  }
  return collector.result();
}

/** Where a browser saves the purchase history download. */
export function defaultFandangoCsvPath(): string {
  return path.join(os.homedir(), "Downloads", "FandangoPurchaseHistory.csv");
}

/**
 * Without an explicit path the default download location is tried, and a
 * missing file there leaves the source unconfigured.
 */
export function createFandangoSource(filePath: string | undefined, removable = false): RecordSource<"purchase"> {
  return createExportSource({
    kind: "purchase",
    name: "fandango",
    filePath: filePath ?? defaultFandangoCsvPath(),
    parse: parseFandangoHistory,
    removable,
    missingIsUnconfigured: filePath === undefined
  });
}
