import readline from "node:readline";
import { EnvironmentError } from "../errors";
import type { ManagerKey } from "./state";

export type KeyReader = {
  next: () => Promise<ManagerKey>;
};

export type Screen = {
  show: (lines: string[]) => void;
  clear: () => void;
};

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/** Shape of the second argument of readline's "keypress" event. */
export type Keypress = {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

const CLEAR_SCREEN = "\u001b[2J\u001b[H";

export function keyFromKeypress(str: string | undefined, key: Keypress | undefined): ManagerKey {
  if (key?.ctrl && key.name === "c") return "quit";
  switch (key?.name) {
    case "up":
      return "up";
    case "down":
      return "down";
    case "space":
      return "toggle";
  }
  switch (str?.toLowerCase()) {
    case " ":
      return "toggle";
    case "a":
      return "add";
    case "d":
      return "delete";
    case "q":
      return "quit";
    default:
      return "other";
  }
}

/**
 * Reads one key at a time from a TTY. Raw mode is only on while a key is
 * awaited, so line prompts in between behave normally. Escape sequences
 * (arrow keys) are assembled by readline's keypress decoder, which gives up
 * on a lone Escape after a short timeout.
 *
 * Keys decoded from the same chunk as the awaited one are queued for the
 * following reads. Keypresses seen while no read is in progress belong to a
 * line prompt and are ignored.
 */
export function createTerminalKeyReader(input: TerminalInput = process.stdin): KeyReader {
  const setRawMode = input.setRawMode?.bind(input);
  if (!input.isTTY || !setRawMode) {
    throw new EnvironmentError("Edit mode requires an interactive terminal");
  }
  readline.emitKeypressEvents(input);

  const queued: ManagerKey[] = [];
  let waiter: ((key: ManagerKey) => void) | undefined;
  let reading = false;

  input.on("keypress", (str: string | undefined, key: Keypress | undefined) => {
    if (!reading) return;
    const decoded = keyFromKeypress(str, key);
    const deliver = waiter;
    if (!deliver) {
      queued.push(decoded);
      return;
    }
    waiter = undefined;
    setRawMode(false);
    input.pause();
    deliver(decoded);
    // The rest of this chunk is emitted synchronously after us.
    process.nextTick(() => {
      if (!waiter) reading = false;
    });
  });

  return {
    next: () => {
      const key = queued.shift();
      if (key !== undefined) return Promise.resolve(key);
      return new Promise<ManagerKey>((resolve) => {
        waiter = resolve;
        reading = true;
        setRawMode(true);
        input.resume();
      });
    },
  };
}

export function createTerminalScreen(output: NodeJS.WritableStream = process.stdout): Screen {
  return {
    show: (lines) => {
      output.write(CLEAR_SCREEN);
      output.write(lines.join("\n") + "\n");
    },
    clear: () => {
      output.write(CLEAR_SCREEN);
    },
  };
}
