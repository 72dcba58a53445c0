import fs from "node:fs/promises";
import path from "node:path";
import { errnoCode, IoError } from "../errors";

export type AtomicWriteOptions = {
  /** Permission bits of the resulting file. Defaults to owner read/write. */
  mode?: number;
};

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return false;
    throw error;
  }
}

export async function safeReadFileBytes(filePath: string): Promise<Uint8Array | undefined> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return undefined;
    throw error;
  }
}

export async function safeReadFileUtf8(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return undefined;
    throw error;
  }
}

/** Permission bits of an existing file, or undefined when it is missing. */
export async function safeFileMode(filePath: string): Promise<number | undefined> {
  try {
    return (await fs.stat(filePath)).mode & 0o777;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return undefined;
    throw error;
  }
}

export async function safeUnlink(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return;
    throw error;
  }
}

function tempPathFor(filePath: string): string {
  return `${filePath}.tmp.${process.pid}.${Math.random().toString(16).slice(2)}`;
}

/**
 * Writes `data` next to `filePath` and renames it into place, so readers see
 * either the old file or the complete new one.
 */
export async function writeFileAtomicBytes(
  filePath: string,
  data: Uint8Array | string,
  opts: AtomicWriteOptions = {},
): Promise<void> {
  const mode = opts.mode ?? 0o600;
  const tmpPath = tempPathFor(filePath);
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
    await fs.writeFile(tmpPath, data, { mode });
    // writeFile's mode is filtered through the umask.
    await fs.chmod(tmpPath, mode);
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw new IoError(`Failed to write ${filePath}: ${errnoCode(error) ?? String(error)}`, filePath, error);
  }
}

export async function writeFileAtomicText(
  filePath: string,
  text: string,
  opts: AtomicWriteOptions = {},
): Promise<void> {
  await writeFileAtomicBytes(filePath, text, opts);
}
