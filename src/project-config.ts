import { ValidationError } from "./errors";
import { fileExists, safeFileMode, safeReadFileUtf8, writeFileAtomicText } from "./lib/fs-atomic";
import { projectConfigPath } from "./paths";
import type { ProjectConfigKey } from "./types";

// Mode for a new claspConfig.txt; an existing file keeps its own.
const NEW_CONFIG_FILE_MODE = 0o644;

function assertKey(key: string): void {
  if (!key || key.includes("=") || /[\r\n]/.test(key)) {
    throw new ValidationError(`Invalid config key: ${JSON.stringify(key)}`);
  }
}

function assertValue(value: string): void {
  if (/[\r\n]/.test(value)) {
    throw new ValidationError("Config values cannot contain line breaks.");
  }
}

function splitLines(text: string): string[] {
  if (!text) return [];
  const body = text.endsWith("\n") ? text.slice(0, -1) : text;
  return body.split("\n");
}

/** Value of the first `key=` line, with CRs removed and whitespace trimmed. */
export function parseConfigValue(text: string, key: string): string | undefined {
  const prefix = `${key}=`;
  for (const line of splitLines(text)) {
    if (!line.startsWith(prefix)) continue;
    return line.slice(prefix.length).replace(/\r/g, "").trim();
  }
  return undefined;
}

/**
 * Rewrites every `key=` line in place, or appends one when the key is new.
 * All other lines are kept byte for byte and in order.
 */
export function upsertConfigLine(text: string, key: string, value: string): string {
  assertKey(key);
  assertValue(value);
  const prefix = `${key}=`;
  const replacement = `${key}=${value}`;

  let found = false;
  const lines = splitLines(text).map((line) => {
    if (!line.startsWith(prefix)) return line;
    found = true;
    return replacement;
  });
  if (!found) lines.push(replacement);
  return lines.join("\n") + "\n";
}

export async function readConfigValue(filePath: string, key: string): Promise<string | undefined> {
  const text = await safeReadFileUtf8(filePath);
  if (text === undefined) return undefined;
  return parseConfigValue(text, key);
}

export async function writeConfigValue(filePath: string, key: string, value: string): Promise<void> {
  const current = (await safeReadFileUtf8(filePath)) ?? "";
  const next = upsertConfigLine(current, key, value);
  const mode = (await safeFileMode(filePath)) ?? NEW_CONFIG_FILE_MODE;
  await writeFileAtomicText(filePath, next, { mode });
}

export async function hasProjectConfig(cwd: string): Promise<boolean> {
  return await fileExists(projectConfigPath(cwd));
}

export async function readProjectValue(cwd: string, key: ProjectConfigKey): Promise<string | undefined> {
  return await readConfigValue(projectConfigPath(cwd), key);
}

export async function writeProjectValue(cwd: string, key: ProjectConfigKey, value: string): Promise<void> {
  await writeConfigValue(projectConfigPath(cwd), key, value);
}

/** The account configured for the project in `cwd`, if there is one. */
export async function projectAccount(cwd: string): Promise<string | undefined> {
  const account = await readProjectValue(cwd, "account");
  return account || undefined;
}
