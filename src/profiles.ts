import { ValidationError } from "./errors";
import type { Io } from "./io";
import type { LoginProvider } from "./login";
import type { AccountListEntry, Identity } from "./types";
import { ensureVaultDir, hasIdentity, isValidAccountName, listIdentities, storeIdentity } from "./vault";

export type AccountContext = {
  io: Io;
  login: LoginProvider;
};

export const CREATE_ACCOUNT_CHOICE = "N";

export { isValidAccountName };

export function normalizeAccountName(name: string): string {
  return name.trim();
}

export async function assertNewAccountName(name: string): Promise<void> {
  if (!isValidAccountName(name)) {
    throw new ValidationError("Invalid name. Use only letters, numbers, hyphens and underscores.");
  }
  if (await hasIdentity(name)) {
    throw new ValidationError("An account with that name already exists.");
  }
}

export async function listAccounts(activeAccount?: string): Promise<AccountListEntry[]> {
  const names = await listIdentities();
  return names.map((name) => ({ name, isActive: name === activeAccount }));
}

export function formatAccountList(accounts: AccountListEntry[]): string[] {
  if (!accounts.length) {
    return ["No saved accounts.", "Use 'claspctx --edit' to add an account."];
  }
  return accounts.map((a) => (a.isActive ? `${a.name} (active)` : a.name));
}

/** Announces the vault directory the first time it is created. */
export async function prepareVault(io: Io): Promise<void> {
  const created = await ensureVaultDir();
  if (created) io.warn(`Created credentials directory: ${created}`);
}

/**
 * Logs in through the provider and stores the result under `name`.
 * The vault is only written after the login succeeded.
 */
export async function provisionAccount(ctx: AccountContext, name: string): Promise<Identity> {
  await prepareVault(ctx.io);
  ctx.io.say();
  ctx.io.say("IMPORTANT: Make sure the active browser is signed in to the correct Google account.");
  ctx.io.say();
  await ctx.io.ask("Press Enter when ready to continue...");
  ctx.io.say();
  ctx.io.say("Logging in with clasp...");

  ctx.io.suspend();
  const credentials = await ctx.login.login();
  const identity = await storeIdentity(name, credentials);
  ctx.io.say();
  ctx.io.say(`Credentials saved for account: ${name}`);
  return identity;
}

export async function createAccount(ctx: AccountContext, proposedName: string): Promise<Identity> {
  const name = normalizeAccountName(proposedName);
  await assertNewAccountName(name);
  return await provisionAccount(ctx, name);
}

export async function createAccountInteractive(ctx: AccountContext): Promise<Identity> {
  await prepareVault(ctx.io);
  while (true) {
    ctx.io.say();
    const name = normalizeAccountName(
      await ctx.io.ask("Name for the new account (letters, numbers, hyphens and underscores only): "),
    );
    try {
      await assertNewAccountName(name);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      ctx.io.warn(error.message);
      continue;
    }
    return await provisionAccount(ctx, name);
  }
}

/** Lets the operator pick a stored account or create a new one. */
export async function promptAccountSelection(ctx: AccountContext): Promise<string> {
  while (true) {
    const names = await listIdentities();

    ctx.io.say();
    ctx.io.say("Select a Google account:");
    ctx.io.say();
    if (names.length) {
      names.forEach((name, i) => ctx.io.say(`  ${i + 1}) ${name}`));
    } else {
      ctx.io.say("  (No saved accounts)");
    }
    ctx.io.say();
    ctx.io.say(`  ${CREATE_ACCOUNT_CHOICE}) Create new account`);
    ctx.io.say();

    const choice = await ctx.io.ask(`Selection (number or ${CREATE_ACCOUNT_CHOICE}): `);
    if (choice.toUpperCase() === CREATE_ACCOUNT_CHOICE) {
      return (await createAccountInteractive(ctx)).name;
    }

    const index = /^\d+$/.test(choice) ? Number.parseInt(choice, 10) : Number.NaN;
    const picked = names[index - 1];
    if (index >= 1 && picked !== undefined) return picked;

    ctx.io.warn("Invalid selection. Try again.");
  }
}
