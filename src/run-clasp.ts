import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import { EnvironmentError, errnoCode } from "./errors";

export type RunClaspOptions = {
  /** Relay clasp's stdout to our stderr, keeping our stdout clean. */
  stdoutToStderr?: boolean;
};

export function claspCommand(): string {
  const override = process.env.CLASPCTX_CLASP;
  if (override && override.trim()) return override.trim();
  return "clasp";
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) return false;
    await fs.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Resolves `command` the way a shell would, or undefined when it is not installed. */
export async function findOnPath(command: string, searchPath = process.env.PATH ?? ""): Promise<string | undefined> {
  if (command.includes(path.sep)) {
    return (await isExecutable(command)) ? path.resolve(command) : undefined;
  }
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    if (await isExecutable(candidate)) return candidate;
  }
  return undefined;
}

export async function ensureClaspInstalled(): Promise<void> {
  const command = claspCommand();
  if (await findOnPath(command)) return;
  throw new EnvironmentError(`${command} is not installed. Install it with: npm install -g @google/clasp`);
}

export async function runClasp(args: string[], opts: RunClaspOptions = {}): Promise<number> {
  const command = claspCommand();
  return await new Promise<number>((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["inherit", opts.stdoutToStderr ? 2 : "inherit", "inherit"],
      env: { ...process.env },
    });
    child.on("error", (error) => {
      if (errnoCode(error) === "ENOENT") {
        reject(new EnvironmentError(`${command} is not installed or not on the PATH.`, { cause: error }));
        return;
      }
      reject(error);
    });
    child.on("exit", (code, signal) => {
      if (typeof code === "number") return resolve(code);
      // If terminated by signal, follow common convention.
      return resolve(signal ? 128 : 1);
    });
  });
}
