import type { CanonicalDate, MarkdownSection } from "../journal/types.js";

export const NOT_AVAILABLE = "N/A";
export const UNKNOWN_TITLE = "Unknown Title";

export type RenderContext = {
  /** Day the run happens; used only for "generated on" stamps. */
  runDate: CanonicalDate;
};

/** First occurrence wins; order kept. */
export function uniqueLines(lines: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const line of lines) {
    if (seen.has(line)) continue;
    seen.add(line);
    out.push(line);
  }
  return out;
}

export function foldWhitespace(s: string): string {
  return s.replace(/\s*\r?\n\s*/g, " ").trim();
}

/** Limits `s` to `max` code points, so a surrogate pair is never split. */
export function truncate(s: string, max: number): string {
  const chars = Array.from(s);
  if (chars.length <= max) return s;
  return chars.slice(0, max - 3).join("") + "...";
}

export function escapeCell(s: string): string {
  return foldWhitespace(s).replaceAll("|", "\\|");
}

export function escapeLinkText(s: string): string {
  return s.replace(/[[\]]/g, "\\$&");
}

export function textOr(value: string | undefined, fallback: string = NOT_AVAILABLE): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

export function oneDecimal(value: number | undefined): string {
  if (value === undefined || !Number.isFinite(value)) return NOT_AVAILABLE;
  return (Math.round(value * 10) / 10).toFixed(1);
}

export function wholeNumber(value: number | undefined): string {
  if (value === undefined || !Number.isFinite(value)) return NOT_AVAILABLE;
  return String(Math.round(value));
}

export function celsiusToFahrenheit(c: number): number {
  return (c * 9) / 5 + 32;
}

export function kmhToMph(kmh: number): number {
  return kmh * 0.621371;
}

export function mmToInches(mm: number): number {
  return mm * 0.0393701;
}

export function fractionToPercent(fraction: number | undefined): string {
  if (fraction === undefined || !Number.isFinite(fraction)) return NOT_AVAILABLE;
  return `${Math.round(fraction * 100)}%`;
}

export function tableLines(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  const row = (cells: readonly string[]) => `| ${cells.join(" | ")} |`;
  return [row(headers), row(headers.map(() => "---")), ...uniqueLines(rows.map(row))];
}

export function generatedOn(ctx: RenderContext): string {
  return `_Generated on ${ctx.runDate}_`;
}

/**
 * `marker`, blank line, then the content blocks separated by blank lines.
 * Always ends with exactly one newline.
 */
export function buildSection(marker: string, blocks: ReadonlyArray<readonly string[]>): MarkdownSection {
  const content = blocks.filter((b) => b.length > 0).map((b) => b.join("\n"));
  return { marker, body: [marker, ...content].join("\n\n") + "\n" };
}
