import { activateIdentity } from "./auth-swap";
import { NotFoundError } from "./errors";
import { detectLegacyProject, migrateLegacyProject, type ProjectContext } from "./migration";
import { PROJECT_CONFIG_FILE } from "./paths";
import {
  isValidAccountName,
  prepareVault,
  promptAccountSelection,
  provisionAccount,
} from "./profiles";
import { hasProjectConfig, projectAccount, writeProjectValue } from "./project-config";
import { ensureClaspInstalled, runClasp } from "./run-clasp";

export type RunClasp = (args: string[]) => Promise<number>;

async function selectAndPersistAccount(ctx: ProjectContext): Promise<string> {
  const account = await promptAccountSelection(ctx);
  await writeProjectValue(ctx.cwd, "account", account);
  return account;
}

export async function resolveAccountForProject(ctx: ProjectContext): Promise<string> {
  if (await hasProjectConfig(ctx.cwd)) {
    const account = await projectAccount(ctx.cwd);
    if (account) return account;

    ctx.io.warn(`The file ${PROJECT_CONFIG_FILE} exists but has no account configured.`);
    return await selectAndPersistAccount(ctx);
  }

  if (await detectLegacyProject(ctx.cwd)) {
    const { account } = await migrateLegacyProject(ctx);
    return (await projectAccount(ctx.cwd)) ?? account;
  }

  ctx.io.say();
  ctx.io.say("No project configuration found.");
  const account = await selectAndPersistAccount(ctx);
  ctx.io.say();
  ctx.io.say(`Configuration saved to ${PROJECT_CONFIG_FILE}`);
  return account;
}

async function askRecoveryChoice(ctx: ProjectContext, account: string): Promise<"create" | "select"> {
  ctx.io.say();
  ctx.io.say("What would you like to do?");
  ctx.io.say(`  1) Create the account '${account}' now`);
  ctx.io.say("  2) Select another account");
  ctx.io.say();
  while (true) {
    const choice = await ctx.io.ask("Selection [1/2]: ");
    if (choice === "1") return "create";
    if (choice === "2") return "select";
    ctx.io.warn("Invalid selection. Enter 1 or 2.");
  }
}

/**
 * Activates `account`, offering to create it or pick another one when its
 * credentials are missing. Resolves with the account that ended up active.
 */
export async function switchToAccount(ctx: ProjectContext, account: string): Promise<string> {
  let target = account;
  while (true) {
    try {
      await activateIdentity(target);
      return target;
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      ctx.io.warn(error.message);
    }

    const choice = await askRecoveryChoice(ctx, target);
    if (choice === "create") {
      if (!isValidAccountName(target)) {
        ctx.io.warn(`'${target}' is not a valid account name. Select another account.`);
        continue;
      }
      await provisionAccount(ctx, target);
      continue;
    }

    target = await selectAndPersistAccount(ctx);
  }
}

/**
 * Makes the project's account active, then runs clasp with `claspArgs`.
 * Without arguments only the switch happens. Resolves with the exit code.
 */
export async function runProjectCommand(
  ctx: ProjectContext,
  claspArgs: string[],
  run: RunClasp = runClasp,
): Promise<number> {
  await ensureClaspInstalled();
  await prepareVault(ctx.io);

  const resolved = await resolveAccountForProject(ctx);
  const account = await switchToAccount(ctx, resolved);

  if (!claspArgs.length) {
    ctx.io.say();
    ctx.io.say(`Active account: ${account}`);
    ctx.io.say("Use 'claspctx <command>' to run clasp commands.");
    return 0;
  }

  ctx.io.suspend();
  return await run(claspArgs);
}
