import { parseCsvRecords } from "./csv.js";
import { RecordCollector, createExportSource, type ParsedRecords } from "./exportSource.js";
import type { RecordSource } from "./types.js";

/** Netflix `ViewingActivity.csv`: `Title`, `Date` (MM/DD/YY). */
export function parseNetflixHistory(text: string): ParsedRecords<"streaming"> {
  const rows = parseCsvRecords(text);
  const [first] = rows;
  if (first && !("Title" in first && "Date" in first)) {
    return { ok: false, message: "expected 'Title' and 'Date' columns" };
  }

  const collector = new RecordCollector("streaming", "netflix", ["us-short", "us-long", "iso"]);
  for (const row of rows) {
    const title = row.Title?.trim();
    const date = row.Date?.trim();
    if (!title || !date) {
      collector.drop("missing_field");
      continue;
    }
    collector.add(date, { title });
  }
  return collector.result();
}

export function createNetflixSource(filePath: string | undefined, removable = false): RecordSource<"streaming"> {
  return createExportSource({
    kind: "streaming",
    name: "netflix",
    filePath,
    parse: parseNetflixHistory,
    removable
  });
}
