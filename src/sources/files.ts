import { readFile, rm } from "node:fs/promises";
import { errorMessage, logger } from "../logger.js";
import type { SourceFailureReason } from "./types.js";

export type ExportRead =
  | { ok: true; text: string }
  | { ok: false; reason: SourceFailureReason; message: string };

export async function readExport(filePath: string | undefined, label: string): Promise<ExportRead> {
  if (!filePath) {
    return { ok: false, reason: "not_configured", message: `${label} path is not configured` };
  }
  try {
    return { ok: true, text: await readFile(filePath, "utf8") };
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { ok: false, reason: "not_found", message: `${label} not found: ${filePath}` };
    }
    return { ok: false, reason: "unavailable", message: `${label} unreadable: ${errorMessage(err)}` };
  }
}

/** Deletes an imported export file. Returns false (and logs) on failure. */
export async function removeExport(filePath: string | undefined): Promise<boolean> {
  if (!filePath) return false;
  try {
    await rm(filePath);
    logger.info("source.export.deleted", { filePath });
    return true;
  } catch (err) {
    logger.warn("source.export.delete_failed", { filePath, error: errorMessage(err) });
    return false;
  }
}
