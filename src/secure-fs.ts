/**
 * File I/O helpers for transaction files.
 *
 * Writes go to a temp file beside the target and are renamed into place, so
 * a reader never sees a half-written transaction. Files are created
 * owner-only (600) regardless of the system umask.
 */

import { writeFile, rename, chmod, unlink, mkdir } from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { randomBytes } from "node:crypto";

/** Owner-only file permissions (rw-------) */
export const FILE_PERMS = 0o600;

/**
 * Atomically replace `filePath` with `data`.
 * Ensures the parent directory exists.
 */
export async function secureWriteFile(filePath: string, data: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
  const tmp = join(dir, `.${basename(filePath)}.${randomBytes(4).toString("hex")}.tmp`);
  try {
    await writeFile(tmp, data, { encoding: "utf-8", mode: FILE_PERMS });
    // writeFile's mode is subject to umask
    await chmod(tmp, FILE_PERMS);
    await rename(tmp, filePath);
  } catch (err) {
    await unlink(tmp).catch(() => undefined);
    throw err;
  }
}
