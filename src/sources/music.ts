import { parseCsvRecords } from "./csv.js";
import { RecordCollector, createExportSource, type ParsedRecords } from "./exportSource.js";
import type { RecordSource } from "./types.js";

/**
 * Apple Music play activity: `Track Name`, `Last Played Date` as epoch
 * milliseconds.
 */
export function parseAppleMusicHistory(text: string): ParsedRecords<"music"> {
  const rows = parseCsvRecords(text);
  const [first] = rows;
  if (first && !("Track Name" in first && "Last Played Date" in first)) {
    return { ok: false, message: "expected 'Track Name' and 'Last Played Date' columns" };
  }

  const collector = new RecordCollector("music", "apple-music", ["epoch-ms"]);
  for (const row of rows) {
    const trackName = row["Track Name"]?.trim();
    if (!trackName) {
      collector.drop("missing_field");
      continue;
    }
    collector.add(row["Last Played Date"]?.trim(), { trackName });
  }
  return collector.result();
}

export function createAppleMusicSource(filePath: string | undefined, removable = false): RecordSource<"music"> {
  return createExportSource({
    kind: "music",
    name: "apple-music",
    filePath,
    parse: parseAppleMusicHistory,
    removable
  });
}
