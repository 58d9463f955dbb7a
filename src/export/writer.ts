/**
 * Output file writer
 *
 * Content goes to a sibling temp file first and is renamed into place, so a
 * failed run never leaves a half-written CSV behind.
 */

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { OutputError } from "../errors.js";

/**
 * Write `content` to `filePath`, creating the parent directory if needed
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new OutputError(
      `Cannot create output directory ${dir}: ${error instanceof Error ? error.message : "Unknown error"}`,
      dir,
      error instanceof Error ? error : undefined
    );
  }

  try {
    await writeFile(tempPath, content, "utf8");
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new OutputError(
      `Cannot write ${filePath}: ${error instanceof Error ? error.message : "Unknown error"}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}
