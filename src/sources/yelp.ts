import { parse } from "node-html-parser";
import { RecordCollector, createExportSource, type ParsedRecords } from "./exportSource.js";
import type { RecordSource } from "./types.js";

function parseRating(raw: string): number | undefined {
  const n = Number.parseFloat(raw.trim());
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Yelp review export: the first `<table>`; header rows (with `<th>`) are
 * skipped; data rows are Date, Business Name, Rating, Comment.
 */
export function parseYelpReviews(html: string): ParsedRecords<"review"> {
  const root = parse(html);
  const table = root.querySelector("table");
  if (!table) return { ok: false, message: "no <table> in review export" };

  const collector = new RecordCollector("review", "yelp", ["iso", "us-long", "month-day-year"]);
  for (const row of table.querySelectorAll("tr")) {
    if (row.querySelector("th")) continue;
    const cells = row.querySelectorAll("td").map((td) => td.text.trim());
    if (cells.length < 4) {
      collector.drop("short_row");
      continue;
    }
    const [date = "", businessName = "", rating = "", comment = ""] = cells;
    collector.add(date, { businessName, rating: parseRating(rating), comment });
  }
  return collector.result();
}

export function createYelpSource(filePath: string | undefined, removable = false): RecordSource<"review"> {
  return createExportSource({
    kind: "review",
    name: "yelp",
    filePath,
    parse: parseYelpReviews,
    removable
  });
}
