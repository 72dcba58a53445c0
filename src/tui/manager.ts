import { createAccountInteractive, prepareVault, type AccountContext } from "../profiles";
import { deleteIdentity, listIdentities } from "../vault";
import { renderManager } from "./render";
import {
  createManagerState,
  handleKey,
  reloadAccounts,
  selectedAccounts,
  withMessage,
  type ManagerState,
} from "./state";
import type { KeyReader, Screen } from "./terminal";

export type ManagerDeps = AccountContext & {
  keys: KeyReader;
  screen: Screen;
  /** Account of the project in the current directory, marked in the list. */
  activeAccount?: string;
};

async function addAccount(deps: ManagerDeps, state: ManagerState): Promise<ManagerState> {
  deps.screen.clear();
  const identity = await createAccountInteractive(deps);
  const reloaded = reloadAccounts(state, await listIdentities());
  return withMessage(reloaded, `Account '${identity.name}' added`);
}

async function deleteSelected(deps: ManagerDeps, state: ManagerState): Promise<ManagerState> {
  const doomed = selectedAccounts(state);
  if (!doomed.length) return state;

  const { io } = deps;
  if (state.activeAccount && doomed.includes(state.activeAccount)) {
    io.warn("");
    io.warn("WARNING: You are about to delete the active account in this project.");
    io.warn("   You will need to select another account the next time you use claspctx.");
  }

  io.say();
  const plural = doomed.length > 1 ? "s" : "";
  const answer = await io.ask(`Are you sure you want to delete ${doomed.length} account${plural}? (y/N): `);
  if (!/^[Yy]$/.test(answer)) return state;

  for (const name of doomed) {
    await deleteIdentity(name);
  }
  return withMessage(reloadAccounts(state, await listIdentities()), "Accounts deleted");
}

/** Runs the account list screen until the operator quits. */
export async function runAccountManager(deps: ManagerDeps): Promise<void> {
  await prepareVault(deps.io);
  let state = createManagerState(await listIdentities(), deps.activeAccount);

  while (true) {
    deps.screen.show(renderManager(state));
    state = withMessage(state, undefined);

    deps.io.suspend();
    const key = await deps.keys.next();
    const transition = handleKey(state, key);
    state = transition.state;

    switch (transition.command) {
      case "add":
        state = await addAccount(deps, state);
        break;
      case "delete":
        state = await deleteSelected(deps, state);
        break;
      case "quit":
        deps.screen.clear();
        return;
      case "none":
        break;
    }
  }
}
