import { existsSync, mkdirSync } from "fs";
import { writeFile } from "fs/promises";
import { dirname } from "path";
import * as logger from "./logger.js";

/**
 * Ensure a directory exists, creating it if necessary.
 * Throws if the directory cannot be created.
 */
export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
    logger.debug(`Created directory: ${dirPath}`);
  }
}

/**
 * Write data to a file, creating its directory first.
 */
export async function writeToFile(
  filePath: string,
  data: string | Uint8Array
): Promise<void> {
  ensureDir(dirname(filePath));
  await writeFile(filePath, data);
  logger.debug(`Wrote to file: ${filePath}`);
}
