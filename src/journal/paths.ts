import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { logger, errorMessage } from "../logger.js";
import { MONTH_NAMES, isCanonicalDate, splitCanonicalDate } from "./dates.js";
import type { CanonicalDate } from "./types.js";

const JOURNAL_FILE_RE = /^(\d{4}-\d{2}-\d{2})\.md$/;

/** `03-March`: month number first so directories sort chronologically. */
export function monthDirName(month: number): string {
  const name = MONTH_NAMES[month - 1];
  if (!name) throw new Error(`month out of range: ${month}`);
  return `${String(month).padStart(2, "0")}-${name}`;
}

/**
 * `targetDir/YYYY/MM-MonthName/YYYY-MM-DD.md`. Pure: touches no filesystem.
 */
export function resolveJournalPath(date: CanonicalDate, targetDir: string): string {
  const { year, month } = splitCanonicalDate(date);
  return path.join(targetDir, String(year).padStart(4, "0"), monthDirName(month), `${date}.md`);
}

export function parseJournalFileName(fileName: string): CanonicalDate | null {
  const m = JOURNAL_FILE_RE.exec(fileName);
  if (!m || !m[1] || !isCanonicalDate(m[1])) return null;
  return m[1];
}

/**
 * Journal files already present anywhere under `targetDir`, keyed by date.
 * Older trees used other month directory names, so the walk does not assume
 * a layout. When a date appears twice the lexicographically smaller path wins.
 * Missing or unreadable directories contribute nothing.
 */
export async function indexJournalFiles(targetDir: string): Promise<Map<CanonicalDate, string>> {
  const found = new Map<CanonicalDate, string>();
  const pending = [targetDir];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      logger.debug("journal.scan.unreadable", { dir, error: errorMessage(err) });
      continue;
    }

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(full);
        continue;
      }
      if (!entry.isFile()) continue;
      const date = parseJournalFileName(entry.name);
      if (!date) continue;
      const current = found.get(date);
      if (current === undefined || full < current) found.set(date, full);
    }
  }

  return found;
}
