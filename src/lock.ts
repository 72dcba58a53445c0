import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { EnvironmentError, errnoCode } from "./errors";
import { activationLockDir } from "./paths";

export type LockOwner = {
  pid: number;
  startedAt: string;
  account: string;
};

export type AcquireLockOptions = {
  account: string;
  /** How long to wait for a live owner before giving up. */
  timeoutMs?: number;
  pollMs?: number;
  /** Age after which a lock directory without an owner record is abandoned. */
  staleMs?: number;
};

export type LockHandle = {
  owner: LockOwner;
  release: () => Promise<void>;
};

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_POLL_MS = 100;

function isPidRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoCode(error) === "EPERM";
  }
}

function parseOwner(raw: string): LockOwner | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    // Owner file is written right after mkdir; a reader can catch it half-written.
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null) return undefined;
  const { pid, startedAt, account } = parsed as Record<string, unknown>;
  if (typeof pid !== "number") return undefined;
  if (typeof startedAt !== "string") return undefined;
  if (typeof account !== "string") return undefined;
  return { pid, startedAt, account };
}

async function readOwner(lockDir: string): Promise<LockOwner | undefined> {
  try {
    return parseOwner(await fs.readFile(path.join(lockDir, "owner.json"), "utf8"));
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return undefined;
    throw error;
  }
}

/** Whether an owner-less lock directory was left behind by a process that died after mkdir. */
async function isAbandoned(lockDir: string, staleMs: number): Promise<boolean> {
  try {
    const stat = await fs.stat(lockDir);
    return Date.now() - stat.mtimeMs > staleMs;
  } catch (error) {
    // Released between our mkdir and stat: retry right away.
    if (errnoCode(error) === "ENOENT") return true;
    throw error;
  }
}

async function writeOwner(lockDir: string, owner: LockOwner): Promise<void> {
  await fs.writeFile(path.join(lockDir, "owner.json"), JSON.stringify(owner, null, 2) + "\n", {
    mode: 0o600,
  });
}

/**
 * Advisory lock serializing writes to the clasp credentials file between
 * claspctx processes. It does not stop clasp itself from reading the file.
 */
export async function acquireActivationLock(opts: AcquireLockOptions): Promise<LockHandle> {
  const lockDir = activationLockDir();
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const pollMs = opts.pollMs ?? DEFAULT_POLL_MS;
  const staleMs = opts.staleMs ?? DEFAULT_TIMEOUT_MS;
  await fs.mkdir(path.dirname(lockDir), { recursive: true, mode: 0o700 });
  const owner: LockOwner = {
    pid: process.pid,
    startedAt: new Date().toISOString(),
    account: opts.account,
  };
  const deadline = Date.now() + timeoutMs;

  while (true) {
    try {
      await fs.mkdir(lockDir, { recursive: false, mode: 0o700 });
      await writeOwner(lockDir, owner);
      return {
        owner,
        release: async () => {
          await fs.rm(lockDir, { recursive: true, force: true });
        },
      };
    } catch (error) {
      if (errnoCode(error) !== "EEXIST") throw error;

      const existingOwner = await readOwner(lockDir);
      const reclaim = existingOwner
        ? !isPidRunning(existingOwner.pid)
        : await isAbandoned(lockDir, staleMs);
      if (reclaim) {
        await fs.rm(lockDir, { recursive: true, force: true });
        continue;
      }

      if (Date.now() < deadline) {
        await sleep(pollMs);
        continue;
      }

      const who = existingOwner
        ? `${existingOwner.account} (pid ${existingOwner.pid}, started ${existingOwner.startedAt})`
        : `an unknown process (remove ${lockDir} if no other claspctx is running)`;
      throw new EnvironmentError(`Account switch is locked by ${who}.`);
    }
  }
}

export async function withActivationLock<T>(account: string, fn: () => Promise<T>): Promise<T> {
  const lock = await acquireActivationLock({ account });
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
