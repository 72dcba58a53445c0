#!/usr/bin/env node
import { runProjectCommand } from "./bootstrap";
import { formatCliError } from "./cli-output";
import { createConsoleIo } from "./io";
import { claspLogin } from "./login";
import { formatAccountList, listAccounts } from "./profiles";
import { buildProgram } from "./program";
import { projectAccount } from "./project-config";
import { runAccountManager } from "./tui/manager";
import { createTerminalKeyReader, createTerminalScreen } from "./tui/terminal";

async function main(): Promise<void> {
  const cwd = process.cwd();
  const io = createConsoleIo();

  const program = buildProgram({
    list: async () => {
      const accounts = await listAccounts(await projectAccount(cwd));
      for (const line of formatAccountList(accounts)) console.log(line);
    },
    edit: async () => {
      // Checked before anything touches the vault.
      const keys = createTerminalKeyReader(process.stdin);
      await runAccountManager({
        io,
        login: claspLogin,
        keys,
        screen: createTerminalScreen(process.stdout),
        activeAccount: await projectAccount(cwd),
      });
    },
    run: async (claspArgs) => {
      const exitCode = await runProjectCommand({ cwd, io, login: claspLogin }, claspArgs);
      process.exit(exitCode);
    },
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatCliError(error));
  process.exit(1);
});
