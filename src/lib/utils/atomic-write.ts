import { randomBytes } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";

export type AtomicWriteData = Parameters<typeof fs.promises.writeFile>[1];

function tempPathFor(finalPath: string): string {
  const dir = path.dirname(finalPath);
  const base = path.basename(finalPath);
  return path.join(dir, `.${base}.${randomBytes(6).toString("hex")}.tmp`);
}

async function removeTemp(tempPath: string): Promise<void> {
  try {
    await fs.promises.unlink(tempPath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      throw err;
    }
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw signal.reason instanceof Error
      ? signal.reason
      : new Error("Write aborted");
  }
}

/**
 * Writes `data` next to `finalPath` under a unique temporary name, then
 * renames it into place. Nothing appears at `finalPath` unless the whole
 * write succeeded and `signal` was not aborted when the rename was issued.
 *
 * @returns bytes written
 */
export async function writeFileAtomic(
  finalPath: string,
  data: AtomicWriteData,
  options: { signal?: AbortSignal } = {},
): Promise<number> {
  const { signal } = options;
  throwIfAborted(signal);

  const tempPath = tempPathFor(finalPath);
  try {
    await fs.promises.writeFile(tempPath, data, { flag: "wx" });
    const { size } = await fs.promises.stat(tempPath);
    // Last abort check; the rename is issued in the same tick.
    throwIfAborted(signal);
    await fs.promises.rename(tempPath, finalPath);
    return size;
  } catch (err) {
    await removeTemp(tempPath);
    throw err;
  }
}
