import { parseCsv } from "./csv.js";
import { RecordCollector, createExportSource, type ParsedRecords } from "./exportSource.js";
import type { RecordSource } from "./types.js";

const SPLIT_MONTH_DAY = /^[A-Za-z]+\.?\s+\d{1,2}$/;
const SPLIT_YEAR = /^\s*\d{4}\s*$/;

/**
 * Ticketmaster order export: `date,location,event` with the date often left
 * unquoted as `Feb 29, 2020`, which splits it across two cells. Event names
 * may themselves contain commas.
 */
export function splitTicketmasterRow(cells: readonly string[]): { date: string; location: string; event: string } {
  let rest = [...cells];
  let date = rest[0] ?? "";
  if (rest.length >= 3 && SPLIT_MONTH_DAY.test(date.trim()) && SPLIT_YEAR.test(rest[1] ?? "")) {
    date = `${date},${rest[1]}`;
    rest = [date, ...rest.slice(2)];
  }
  return {
    date: date.trim(),
    location: (rest[1] ?? "").trim(),
    event: rest.slice(2).join(",").trim()
  };
}

export function parseTicketmasterHistory(text: string): ParsedRecords<"event"> {
  const [, ...rows] = parseCsv(text);

  const collector = new RecordCollector("event", "ticketmaster", [
    "iso",
    "month-day-year",
    "us-long",
    "us-short",
    "day-month-year"
  ]);
  for (const cells of rows) {
    const { date, location, event } = splitTicketmasterRow(cells);
    if (!date || !event) {
      collector.drop("missing_field");
      continue;
    }
    collector.add(date, { event, location: location || undefined });
  }
  return collector.result();
}

export function createTicketmasterSource(filePath: string | undefined, removable = false): RecordSource<"event"> {
  return createExportSource({
    kind: "event",
    name: "ticketmaster",
    filePath,
    parse: parseTicketmasterHistory,
    removable
  });
}
