#!/usr/bin/env node
import { stat } from "node:fs/promises";
import { enabledSources, loadConfig } from "./config.js";
import { addDays, localDayKey } from "./journal/dates.js";
import { errorMessage, logger, setLogLevel } from "./logger.js";
import { JournalPipeline } from "./pipeline/journalPipeline.js";
import { buildSources } from "./sources/index.js";

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function main() {
  const cfg = loadConfig();
  setLogLevel(cfg.LOG_LEVEL);

  if (!(await isDirectory(cfg.TARGET_DIR))) {
    logger.error("journal.target_dir.missing", { targetDir: cfg.TARGET_DIR });
    process.exitCode = 1;
    return;
  }

  const runDate = localDayKey(new Date());
  const apiDate = addDays(runDate, cfg.API_DAY_OFFSET);
  const kinds = enabledSources(cfg);

  logger.info("journal.run.start", {
    targetDir: cfg.TARGET_DIR,
    runDate,
    apiDate,
    sources: kinds,
    createMissing: cfg.JOURNAL_CREATE_MISSING,
    deleteAfterProcessing: cfg.DELETE_AFTER_PROCESSING
  });

  const pipeline = new JournalPipeline({
    targetDir: cfg.TARGET_DIR,
    runDate,
    createMissing: cfg.JOURNAL_CREATE_MISSING,
    deleteAfterProcessing: cfg.DELETE_AFTER_PROCESSING
  });
  const summary = await pipeline.run(buildSources(cfg, kinds, { apiDate }));

  logger.info("journal.run.summary", { ...summary.totals, failedSources: summary.failedSources });
  if (summary.totals.failed > 0) {
    process.exitCode = 2;
  }
}

main().catch((err) => {
  logger.error("fatal", { error: errorMessage(err) });
  process.exitCode = 1;
});
