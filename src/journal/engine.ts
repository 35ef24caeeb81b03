import { constants } from "node:fs";
import { access, appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage, logger } from "../logger.js";
import type { SectionFailureReason, SectionResult } from "./types.js";

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function failed(reason: SectionFailureReason, err: unknown): SectionResult {
  return { status: "failed", reason, message: errorMessage(err) };
}

async function isWritable(target: string): Promise<boolean> {
  try {
    await access(target, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/** Existing content or `null` when the file does not exist. */
async function readExisting(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}

/**
 * Separator that leaves exactly one blank line between `existing` and the
 * appended section.
 */
export function separatorFor(existing: string): string {
  if (existing.endsWith("\n\n")) return "";
  if (existing.endsWith("\n")) return "\n";
  return "\n\n";
}

/**
 * Add `body` to the journal file at `filePath` unless the file already
 * contains `marker`.
 *
 * Never throws: every filesystem problem is reported as a `failed` result so
 * the caller can move on to the next date or section. Once a section with a
 * given marker has been written, later calls for the same marker are no-ops
 * whatever their body; existing content is never rewritten.
 */
export async function ensureSection(filePath: string, marker: string, body: string): Promise<SectionResult> {
  const dir = path.dirname(filePath);

  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    return failed("directory_unwritable", err);
  }

  if (!(await isWritable(dir))) {
    return { status: "failed", reason: "directory_unwritable", message: `directory is not writable: ${dir}` };
  }

  let existing: string | null;
  try {
    existing = await readExisting(filePath);
  } catch (err) {
    return failed("io_error", err);
  }

  if (existing === null || existing.length === 0) {
    try {
      await writeFile(filePath, body, "utf8");
    } catch (err) {
      const code = errnoCode(err);
      return failed(code === "EACCES" || code === "EPERM" ? "file_unwritable" : "io_error", err);
    }
    logger.debug("journal.section.created", { filePath, marker });
    return { status: "created" };
  }

  if (existing.includes(marker)) {
    logger.debug("journal.section.skipped", { filePath, marker });
    return { status: "skipped" };
  }

  if (!(await isWritable(filePath))) {
    return { status: "failed", reason: "file_unwritable", message: `file is not writable: ${filePath}` };
  }

  try {
    await appendFile(filePath, separatorFor(existing) + body, "utf8");
  } catch (err) {
    return failed("io_error", err);
  }
  logger.debug("journal.section.appended", { filePath, marker });
  return { status: "appended" };
}
