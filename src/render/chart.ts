import type { ChartEntry, MarkdownSection } from "../journal/types.js";
import { UNKNOWN_TITLE, buildSection, escapeCell, tableLines, textOr, wholeNumber } from "./markdown.js";

export const CHART_MARKER = "## Billboard Hot 100";

const HEADERS = ["Rank", "Title", "Artist", "Last Week", "Peak", "Weeks on Chart"] as const;

export function renderChart(entries: ReadonlyArray<Readonly<ChartEntry>>): MarkdownSection {
  const rows = entries.map((entry) => [
    wholeNumber(entry.rank),
    escapeCell(textOr(entry.title, UNKNOWN_TITLE)),
    escapeCell(textOr(entry.artist)),
    wholeNumber(entry.lastWeek),
    wholeNumber(entry.peakPosition),
    wholeNumber(entry.weeksOnChart)
  ]);
  return buildSection(CHART_MARKER, [tableLines(HEADERS, rows)]);
}
