import { mkdir, stat } from "node:fs/promises";
import * as os from "node:os";
import process from "node:process";

/**
 * Get the temporary directory path, respecting DETFETCH_TMPDIR.
 * Falls back to the system tmpdir() if not set.
 */
export function getTmpDir(): string {
  return process.env.DETFETCH_TMPDIR || os.tmpdir();
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isDirectory();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}
