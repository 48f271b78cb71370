import { open, stat, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../../utils.js";

export const APK_EXTENSION = ".apk";

/** APKs are ZIP archives: local file headers start with "PK". */
const ZIP_MAGIC = Buffer.from("PK", "ascii");

export type ApkCheck = { ok: true; sizeBytes: number } | { ok: false; reason: string };

/**
 * Structural check of an APK before it is handed to adb: suffix, non-empty,
 * ZIP magic. Does not open the archive.
 */
export async function validateApk(apkPath: string): Promise<ApkCheck> {
  if (path.extname(apkPath).toLowerCase() !== APK_EXTENSION) {
    return { ok: false, reason: `expected a ${APK_EXTENSION} file` };
  }

  let handle: FileHandle | undefined;
  try {
    handle = await open(apkPath, "r");
    const { size } = await handle.stat();
    if (size === 0) {
      return { ok: false, reason: "file is empty" };
    }

    const header = Buffer.alloc(ZIP_MAGIC.length);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    if (bytesRead < ZIP_MAGIC.length || !header.equals(ZIP_MAGIC)) {
      return { ok: false, reason: "missing ZIP header" };
    }
    return { ok: true, sizeBytes: size };
  } catch (err) {
    return { ok: false, reason: `cannot read file: ${errorMessage(err)}` };
  } finally {
    await handle?.close();
  }
}

/**
 * Whether a regular file exists at `p`.
 */
export async function fileExists(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile();
  } catch {
    return false;
  }
}
