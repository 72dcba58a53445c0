import { Command } from "commander";
import { ValidationError } from "./errors";

// Keep in sync with package.json manually.
export const VERSION = "0.1.0";

export type CliFlags = {
  help?: boolean;
  list?: boolean;
  edit?: boolean;
};

export type Invocation =
  | { kind: "help" }
  | { kind: "list" }
  | { kind: "edit" }
  | { kind: "run"; claspArgs: string[] };

export type CliHandlers = {
  list: () => Promise<void>;
  edit: () => Promise<void>;
  run: (claspArgs: string[]) => Promise<void>;
};

const HELP_FOOTER = `
Description:
  Stores one set of clasp credentials per Google account and switches
  ~/.clasprc.json to the account configured for the current project before
  running clasp. Arguments that are not claspctx options go to clasp.

Examples:
  claspctx                     Switch to the project's account
  claspctx --list              List all accounts
  claspctx --edit              Open the interactive account manager
  claspctx push                Run 'clasp push' with the project's account
  claspctx deploy -d "v1.0"    Run 'clasp deploy' with the project's account

Files:
  ~/.config/claspctx/accounts/   Stored credentials, one <account>.json each
  ~/.clasprc.json                Credentials clasp reads (replaced on switch)
  claspConfig.txt                Project configuration (account, deploymentId)

Environment:
  CLASPCTX_HOME    Directory used instead of ~/.config/claspctx
  CLASPCTX_CLASP   clasp executable to run (default: clasp)
`;

const FLAGS = ["help", "list", "edit"] as const;

const FLAG_NAMES: Record<keyof CliFlags, string> = {
  help: "--help",
  list: "--list",
  edit: "--edit",
};

/** Decides what a parsed command line asks for. The flags work alone only. */
export function resolveInvocation(flags: CliFlags, claspArgs: string[]): Invocation {
  const given = FLAGS.filter((flag) => flags[flag]);
  const [flag, ...others] = given;
  if (!flag) return { kind: "run", claspArgs };

  if (others.length) {
    throw new ValidationError(`Options ${given.map((f) => FLAG_NAMES[f]).join(", ")} cannot be combined`);
  }
  if (claspArgs.length) {
    throw new ValidationError(`Option ${FLAG_NAMES[flag]} does not accept additional arguments`);
  }
  return { kind: flag };
}

export function buildProgram(handlers: CliHandlers): Command {
  const program = new Command();
  program
    .name("claspctx")
    .description("Multi-account credential manager for clasp")
    .version(VERSION, "-V, --version", "output the version number")
    .helpOption(false)
    .option("-h, --help", "show this help")
    .option("-l, --list", "list saved accounts")
    .option("-e, --edit", "interactive account management")
    .argument("[claspArgs...]", "arguments passed to clasp")
    .passThroughOptions()
    .allowUnknownOption(true)
    .showHelpAfterError(true)
    .addHelpText("after", HELP_FOOTER)
    .action(async (claspArgs: string[], flags: CliFlags) => {
      const invocation = resolveInvocation(flags, claspArgs);
      switch (invocation.kind) {
        case "help":
          program.outputHelp();
          return;
        case "list":
          await handlers.list();
          return;
        case "edit":
          await handlers.edit();
          return;
        case "run":
          await handlers.run(invocation.claspArgs);
          return;
      }
    });
  return program;
}
