import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { resolveJournalPath } from "../src/journal/paths.js";
import type { DatedRecord } from "../src/journal/types.js";
import { JournalPipeline, type PipelineOptions } from "../src/pipeline/journalPipeline.js";
import type { RecordSource } from "../src/sources/types.js";

const viewing: Array<DatedRecord<"streaming">> = [
  { date: "2024-03-06", kind: "streaming", payload: { title: "Show B" } },
  { date: "2024-03-05", kind: "streaming", payload: { title: "Show A" } },
  { date: "2024-03-05", kind: "streaming", payload: { title: "Show A" } }
];

function viewingSource(records: Array<DatedRecord<"streaming">>, cleanup?: () => Promise<boolean>) {
  const source: RecordSource<"streaming"> = {
    kind: "streaming",
    name: "netflix",
    collect: async () => ({ ok: true, records, dropped: 1 })
  };
  if (cleanup) source.cleanup = cleanup;
  return source;
}

const brokenNews: RecordSource<"news"> = {
  kind: "news",
  name: "news-api",
  collect: async () => {
    throw new Error("boom");
  }
};

const unconfiguredChart: RecordSource<"chart"> = {
  kind: "chart",
  name: "billboard-api",
  collect: async () => ({ ok: false, reason: "not_configured", message: "billboard-api endpoint or key is not configured" })
};

describe("JournalPipeline", () => {
  let root: string;
  let options: PipelineOptions;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "journal-pipeline-"));
    options = { targetDir: root, runDate: "2024-03-07", createMissing: true, deleteAfterProcessing: false };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("keeps going when one source fails", async () => {
    const summary = await new JournalPipeline(options).run([brokenNews, unconfiguredChart, viewingSource(viewing)]);

    expect(summary.failedSources).toEqual(["news-api"]);
    expect(summary.sources[0]).toMatchObject({ status: "unavailable", message: "boom", created: 0 });
    expect(summary.sources[1]).toMatchObject({ status: "not_configured" });
    expect(summary.sources[2]).toMatchObject({
      status: "ok",
      records: 3,
      dates: 2,
      created: 2,
      dropped: 1
    });
    expect(summary.totals).toEqual({ created: 2, appended: 0, skipped: 0, failed: 0, dropped: 1 });

    expect(await readFile(resolveJournalPath("2024-03-05", root), "utf8")).toBe(
      "## Netflix Viewing History\n\n- Show A\n"
    );
    expect(await readFile(resolveJournalPath("2024-03-06", root), "utf8")).toBe(
      "## Netflix Viewing History\n\n- Show B\n"
    );
  });

  it("skips everything on a second run", async () => {
    const pipeline = new JournalPipeline(options);
    await pipeline.run([viewingSource(viewing)]);
    const before = await readFile(resolveJournalPath("2024-03-05", root), "utf8");

    const summary = await pipeline.run([viewingSource(viewing)]);

    expect(summary.totals).toMatchObject({ created: 0, appended: 0, skipped: 2, failed: 0 });
    expect(await readFile(resolveJournalPath("2024-03-05", root), "utf8")).toBe(before);
  });

  it("writes only into existing journals when creation is off", async () => {
    const legacy = path.join(root, "2024", "March", "2024-03-05.md");
    await mkdir(path.dirname(legacy), { recursive: true });
    await writeFile(legacy, "# Tuesday\n");

    const summary = await new JournalPipeline({ ...options, createMissing: false }).run([viewingSource(viewing)]);

    expect(summary.sources[0]).toMatchObject({ appended: 1, created: 0, withoutJournal: 1 });
    expect(await readFile(legacy, "utf8")).toBe("# Tuesday\n\n## Netflix Viewing History\n\n- Show A\n");
    await expect(access(resolveJournalPath("2024-03-06", root))).rejects.toThrow();
  });

  it("counts a failed date and still writes the others", async () => {
    await writeFile(path.join(root, "2024"), "blocks the year directory");
    const records: Array<DatedRecord<"streaming">> = [
      { date: "2024-03-05", kind: "streaming", payload: { title: "Show A" } },
      { date: "2025-01-01", kind: "streaming", payload: { title: "Show C" } }
    ];

    const summary = await new JournalPipeline(options).run([viewingSource(records)]);

    expect(summary.sources[0]).toMatchObject({ status: "ok", created: 1, failed: 1 });
    expect(await readFile(resolveJournalPath("2025-01-01", root), "utf8")).toBe(
      "## Netflix Viewing History\n\n- Show C\n"
    );
  });

  it("deletes the export after a run that wrote something", async () => {
    const cleanup = vi.fn(async () => true);
    const summary = await new JournalPipeline({ ...options, deleteAfterProcessing: true }).run([
      viewingSource(viewing, cleanup)
    ]);

    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(summary.sources[0]?.exportDeleted).toBe(true);
  });

  it("keeps the export when nothing was written", async () => {
    const cleanup = vi.fn(async () => true);
    await new JournalPipeline({ ...options, deleteAfterProcessing: true }).run([viewingSource([], cleanup)]);

    expect(cleanup).not.toHaveBeenCalled();
  });

  it("keeps the export when deletion is off", async () => {
    const cleanup = vi.fn(async () => true);
    await new JournalPipeline(options).run([viewingSource(viewing, cleanup)]);

    expect(cleanup).not.toHaveBeenCalled();
  });
});
