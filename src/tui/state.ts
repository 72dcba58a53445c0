export type ManagerKey = "up" | "down" | "toggle" | "add" | "delete" | "quit" | "other";

export type ManagerCommand = "none" | "add" | "delete" | "quit";

export type ManagerState = {
  accounts: string[];
  /** Parallel to `accounts`. */
  selected: boolean[];
  cursor: number;
  /** Shown for one redraw, then cleared. */
  message?: string;
  /** Account configured for the project in the current directory. */
  activeAccount?: string;
};

export type Transition = {
  state: ManagerState;
  command: ManagerCommand;
};

function clampCursor(cursor: number, length: number): number {
  if (length === 0) return 0;
  return Math.min(Math.max(cursor, 0), length - 1);
}

export function createManagerState(accounts: string[], activeAccount?: string): ManagerState {
  return {
    accounts: [...accounts],
    selected: accounts.map(() => false),
    cursor: 0,
    activeAccount,
  };
}

/** Rebuilds the list from `accounts`; selections are dropped and the cursor kept in range. */
export function reloadAccounts(state: ManagerState, accounts: string[]): ManagerState {
  return {
    ...state,
    accounts: [...accounts],
    selected: accounts.map(() => false),
    cursor: clampCursor(state.cursor, accounts.length),
  };
}

export function selectedAccounts(state: ManagerState): string[] {
  return state.accounts.filter((_, i) => state.selected[i] === true);
}

export function withMessage(state: ManagerState, message: string | undefined): ManagerState {
  return { ...state, message };
}

function moveCursor(state: ManagerState, delta: number): ManagerState {
  return { ...state, cursor: clampCursor(state.cursor + delta, state.accounts.length) };
}

function toggleSelection(state: ManagerState): ManagerState {
  if (!state.accounts.length) return state;
  const selected = state.selected.map((flag, i) => (i === state.cursor ? !flag : flag));
  return { ...state, selected };
}

export function handleKey(state: ManagerState, key: ManagerKey): Transition {
  switch (key) {
    case "up":
      return { state: moveCursor(state, -1), command: "none" };
    case "down":
      return { state: moveCursor(state, 1), command: "none" };
    case "toggle":
      return { state: toggleSelection(state), command: "none" };
    case "add":
      return { state, command: "add" };
    case "delete":
      if (selectedAccounts(state).length) return { state, command: "delete" };
      if (!state.accounts.length) return { state, command: "none" };
      return { state: withMessage(state, "No accounts selected"), command: "none" };
    case "quit":
      return { state, command: "quit" };
    case "other":
      return { state, command: "none" };
  }
}
