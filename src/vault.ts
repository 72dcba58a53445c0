import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import { errnoCode, NotFoundError } from "./errors";
import { fileExists, safeReadFileBytes, safeUnlink, writeFileAtomicBytes } from "./lib/fs-atomic";
import { IDENTITY_FILE_EXTENSION, identityPath, vaultDir } from "./paths";
import type { CredentialBlob, Identity } from "./types";

/**
 * Creates the vault directory (owner-only) when it does not exist yet.
 * Resolves with the directory path when it was created by this call.
 */
export async function ensureVaultDir(): Promise<string | undefined> {
  const dir = vaultDir();
  const created = await fs.mkdir(dir, { recursive: true, mode: 0o700 });
  if (created === undefined) return undefined;
  await fs.chmod(dir, 0o700);
  return dir;
}

export function isValidAccountName(name: string): boolean {
  return /^[a-zA-Z0-9_-]+$/.test(name);
}

export async function storeIdentity(name: string, credentials: CredentialBlob): Promise<Identity> {
  await ensureVaultDir();
  await writeFileAtomicBytes(identityPath(name), credentials, { mode: 0o600 });
  return { name, credentials };
}

export async function fetchIdentity(name: string): Promise<Identity> {
  // Names read from claspConfig.txt are untrusted; never resolve them outside the vault.
  if (!isValidAccountName(name)) throw new NotFoundError(name);
  const credentials = await safeReadFileBytes(identityPath(name));
  if (!credentials) throw new NotFoundError(name);
  return { name, credentials };
}

export async function hasIdentity(name: string): Promise<boolean> {
  return await fileExists(identityPath(name));
}

async function readVaultEntries(): Promise<Dirent[]> {
  try {
    return await fs.readdir(vaultDir(), { withFileTypes: true });
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return [];
    throw error;
  }
}

export async function listIdentities(): Promise<string[]> {
  const entries = await readVaultEntries();
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(IDENTITY_FILE_EXTENSION))
    .map((entry) => entry.name.slice(0, -IDENTITY_FILE_EXTENSION.length))
    .filter((name) => name.length > 0)
    .sort();
}

export async function deleteIdentity(name: string): Promise<void> {
  await safeUnlink(identityPath(name));
}
