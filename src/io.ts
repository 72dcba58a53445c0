import readline from "node:readline";
import { EnvironmentError } from "./errors";

/** Everything the interactive flows print or ask goes through here. */
export interface Io {
  /** Status text and menus, on stdout. */
  say(message?: string): void;
  /** Warnings, on stderr. */
  warn(message: string): void;
  /** Prompts on stderr and resolves with the answer line, trimmed. */
  ask(question: string): Promise<string>;
  /** Stops reading input so a child process or the raw key reader can take it. */
  suspend(): void;
}

type Waiter = {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
};

function inputEnded(): EnvironmentError {
  return new EnvironmentError("Input ended before an answer was given.");
}

/**
 * Line source over one input stream. Lines that arrive before anyone asks are
 * queued, so answers typed ahead or piped in all at once are kept.
 */
class LineReader {
  private rl?: readline.Interface;
  private readonly lines: string[] = [];
  private readonly waiting: Waiter[] = [];
  private ended = false;

  constructor(private readonly input: NodeJS.ReadableStream) {
    input.once("end", () => {
      this.ended = true;
    });
  }

  next(): Promise<string> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.reject(inputEnded());

    this.open();
    return new Promise<string>((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  suspend(): void {
    const rl = this.rl;
    if (!rl) return;
    this.rl = undefined;
    // close() pauses the input; queued lines stay queued.
    rl.close();
  }

  private open(): void {
    if (this.rl) return;
    const rl = readline.createInterface({ input: this.input, terminal: false });
    rl.on("line", (line) => {
      const waiter = this.waiting.shift();
      if (waiter) waiter.resolve(line);
      else this.lines.push(line);
    });
    rl.once("close", () => {
      if (this.rl !== rl) return;
      this.rl = undefined;
      this.ended = true;
      for (const waiter of this.waiting.splice(0)) waiter.reject(inputEnded());
    });
    this.rl = rl;
  }
}

export function createConsoleIo(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): Io {
  const reader = new LineReader(input);
  return {
    say: (message = "") => console.log(message),
    warn: (message) => console.error(message),
    ask: async (question) => {
      output.write(question);
      try {
        return (await reader.next()).trim();
      } catch (error) {
        output.write("\n");
        throw error;
      }
    },
    suspend: () => reader.suspend(),
  };
}
