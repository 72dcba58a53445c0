import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Io } from "../src/io";
import type { LoginProvider } from "../src/login";
import type { KeyReader, Screen } from "../src/tui/terminal";
import type { ManagerKey } from "../src/tui/state";

export type Sandbox = {
  root: string;
  home: string;
  toolHome: string;
  cwd: string;
};

let current: Sandbox | undefined;
const originalHome = process.env.HOME;

export async function setupSandbox(): Promise<Sandbox> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "claspctx-test-"));
  const sandbox: Sandbox = {
    root,
    home: path.join(root, "home"),
    toolHome: path.join(root, "tool"),
    cwd: path.join(root, "project"),
  };
  await fs.mkdir(sandbox.home, { recursive: true });
  await fs.mkdir(sandbox.cwd, { recursive: true });
  process.env.HOME = sandbox.home;
  process.env.CLASPCTX_HOME = sandbox.toolHome;
  current = sandbox;
  return sandbox;
}

export async function teardownSandbox(): Promise<void> {
  if (current) {
    await fs.rm(current.root, { recursive: true, force: true });
    current = undefined;
  }
  if (typeof originalHome === "string") process.env.HOME = originalHome;
  else delete process.env.HOME;
  delete process.env.CLASPCTX_HOME;
  delete process.env.CLASPCTX_CLASP;
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export async function readText(filePath: string): Promise<string> {
  return await fs.readFile(filePath, "utf8");
}

export async function modeOf(filePath: string): Promise<number> {
  return (await fs.stat(filePath)).mode & 0o777;
}

export type FakeIo = Io & {
  /** Every call in order, as "say:", "warn:" or "ask:" plus the text. */
  events: string[];
  said: string[];
  warned: string[];
  asked: string[];
  suspends: number;
};

/** Answers prompts from `answers` in order; running out fails the test. */
export function createFakeIo(answers: string[] = []): FakeIo {
  const queue = [...answers];
  const io: FakeIo = {
    events: [],
    said: [],
    warned: [],
    asked: [],
    suspends: 0,
    say: (message = "") => {
      io.said.push(message);
      io.events.push(`say:${message}`);
    },
    warn: (message) => {
      io.warned.push(message);
      io.events.push(`warn:${message}`);
    },
    ask: async (question) => {
      io.asked.push(question);
      io.events.push(`ask:${question}`);
      const answer = queue.shift();
      if (answer === undefined) throw new Error(`Unexpected prompt: ${question}`);
      return answer.trim();
    },
    suspend: () => {
      io.suspends += 1;
    },
  };
  return io;
}

export type FakeLogin = LoginProvider & { calls: number };

export function createFakeLogin(credentials: string | Error = '{"token":"test-token"}'): FakeLogin {
  const fake: FakeLogin = {
    calls: 0,
    login: async () => {
      fake.calls += 1;
      if (credentials instanceof Error) throw credentials;
      return bytes(credentials);
    },
  };
  return fake;
}

export function createScriptedKeys(keys: ManagerKey[]): KeyReader {
  const queue = [...keys];
  return {
    next: async () => {
      const key = queue.shift();
      if (key === undefined) throw new Error("Key script exhausted");
      return key;
    },
  };
}

export type RecordingScreen = Screen & { frames: string[][]; clears: number };

export function createRecordingScreen(): RecordingScreen {
  const screen: RecordingScreen = {
    frames: [],
    clears: 0,
    show: (lines) => {
      screen.frames.push([...lines]);
    },
    clear: () => {
      screen.clears += 1;
    },
  };
  return screen;
}

/** Writes an executable stand-in for clasp and points CLASPCTX_CLASP at it. */
export async function installFakeClasp(sandbox: Sandbox): Promise<string> {
  const binDir = path.join(sandbox.root, "bin");
  await fs.mkdir(binDir, { recursive: true });
  const bin = path.join(binDir, "clasp");
  await fs.writeFile(bin, "#!/bin/sh\nexit 0\n", { mode: 0o755 });
  process.env.CLASPCTX_CLASP = bin;
  return bin;
}
