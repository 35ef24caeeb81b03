import { parse } from "csv-parse/sync";
import { z } from "zod";

const CsvRowsSchema = z.array(z.array(z.string()));

/**
 * Comma separated rows. A quote inside an unquoted field is kept as a literal
 * character; rows may have any number of cells. A leading BOM and blank lines
 * are ignored. Throws `CsvError` on input it cannot read, such as an
 * unterminated quoted field.
 */
export function parseCsv(text: string): string[][] {
  const rows: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_quotes: true,
    relax_column_count: true
  });
  return CsvRowsSchema.parse(rows);
}

/** Rows keyed by the trimmed header cells. Missing trailing cells are "". */
export function parseCsvRecords(text: string): Array<Record<string, string>> {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  const keys = header.map((h) => h.trim());
  return rows.map((cells) => {
    const record: Record<string, string> = {};
    keys.forEach((key, idx) => {
      record[key] = cells[idx] ?? "";
    });
    return record;
  });
}
