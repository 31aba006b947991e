/**
 * Atomic file persistence (write temp, rename).
 *
 * A reader of `filePath` sees either the previous content or the new one,
 * never a partially written file.
 */

import { dirname } from "path";
import { mkdir, rename, unlink, writeFile } from "fs/promises";

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmpFile = `${filePath}.${process.pid}.tmp`;
  await mkdir(dirname(filePath), { recursive: true });
  try {
    await writeFile(tmpFile, content, "utf-8");
    await rename(tmpFile, filePath);
  } catch (error) {
    await unlink(tmpFile).catch(() => undefined);
    throw error;
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
