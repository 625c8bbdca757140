import fs from "fs/promises";
import path from "path";
import { config } from "../config";

export async function ensureDirectoryExists(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Runs `work` with a path inside a private temp directory. The directory and
 * whatever was written into it are removed on every exit path.
 */
export async function withTempFile<T>(fileName: string, work: (filePath: string) => Promise<T>): Promise<T> {
  await ensureDirectoryExists(config.outputDir);
  const dir = await fs.mkdtemp(path.join(config.outputDir, "cost-sheet-"));
  try {
    return await work(path.join(dir, path.basename(fileName)));
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
