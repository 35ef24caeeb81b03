import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { indexJournalFiles, monthDirName, parseJournalFileName, resolveJournalPath } from "../src/journal/paths.js";

describe("journal paths", () => {
  it("names month directories with number and English name", () => {
    expect(monthDirName(3)).toBe("03-March");
    expect(monthDirName(12)).toBe("12-December");
    expect(() => monthDirName(13)).toThrow(/month out of range/);
  });

  it("derives the file path from date and target dir only", () => {
    expect(resolveJournalPath("2024-03-05", "/journal")).toBe(
      path.join("/journal", "2024", "03-March", "2024-03-05.md")
    );
    expect(resolveJournalPath("2024-03-05", "/journal")).toBe(resolveJournalPath("2024-03-05", "/journal"));
  });

  it("rejects non-canonical dates", () => {
    expect(() => resolveJournalPath("2024-13-01", "/journal")).toThrow(/not a canonical date/);
  });

  it("recognises journal file names", () => {
    expect(parseJournalFileName("2024-03-05.md")).toBe("2024-03-05");
    expect(parseJournalFileName("2024-13-01.md")).toBeNull();
    expect(parseJournalFileName("notes.md")).toBeNull();
    expect(parseJournalFileName("2024-03-05.txt")).toBeNull();
  });
});

describe("indexJournalFiles", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "journal-index-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("finds journal files under any directory layout", async () => {
    await mkdir(path.join(root, "2024", "March"), { recursive: true });
    await mkdir(path.join(root, "2024", "03-March"), { recursive: true });
    await writeFile(path.join(root, "2024", "March", "2024-03-05.md"), "# Tue\n");
    await writeFile(path.join(root, "2024", "03-March", "2024-03-06.md"), "# Wed\n");
    await writeFile(path.join(root, "2024", "notes.txt"), "ignored\n");

    const index = await indexJournalFiles(root);
    expect([...index.keys()].sort()).toEqual(["2024-03-05", "2024-03-06"]);
    expect(index.get("2024-03-05")).toBe(path.join(root, "2024", "March", "2024-03-05.md"));
  });

  it("keeps the lexicographically smaller path for duplicate dates", async () => {
    await mkdir(path.join(root, "a"), { recursive: true });
    await mkdir(path.join(root, "b"), { recursive: true });
    await writeFile(path.join(root, "b", "2024-03-07.md"), "");
    await writeFile(path.join(root, "a", "2024-03-07.md"), "");

    const index = await indexJournalFiles(root);
    expect(index.get("2024-03-07")).toBe(path.join(root, "a", "2024-03-07.md"));
  });

  it("returns an empty index for a missing directory", async () => {
    const index = await indexJournalFiles(path.join(root, "missing"));
    expect(index.size).toBe(0);
  });
});
