import { promises as fs } from "node:fs";
import * as path from "node:path";
import { createLogger } from "../utils/logger.js";

const log = createLogger("output");

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Creates the reports directory when missing; returns its absolute path.
 * Throws when the path exists but is not a directory.
 */
export async function ensureReportsDirectory(dir: string): Promise<string> {
  const absolute = path.resolve(dir);
  try {
    const stats = await fs.stat(absolute);
    if (!stats.isDirectory()) {
      throw new Error(`Reports path is not a directory: ${absolute}`);
    }
    log.info("Using existing reports directory", { dir: absolute });
  } catch (err) {
    if (!isMissing(err)) throw err;
    await fs.mkdir(absolute, { recursive: true });
    log.info("Created reports directory", { dir: absolute });
  }
  return absolute;
}
