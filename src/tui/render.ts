import type { ManagerState } from "./state";

const HEAVY_RULE = "═".repeat(42);
const LIGHT_RULE = "─".repeat(42);

const LEGEND = [
  LIGHT_RULE,
  "  [A]dd   [D]elete selected   [Q]uit",
  "  Space: select/deselect",
  "  ↑/↓: navigate",
  LIGHT_RULE,
];

export function renderAccountLine(state: ManagerState, index: number): string {
  const name = state.accounts[index] ?? "";
  const cursor = index === state.cursor ? "> " : "  ";
  const checkbox = state.selected[index] ? "[x]" : "[ ]";
  const suffix = name === state.activeAccount ? " (active)" : "";
  return `${cursor}${checkbox} ${index + 1}. ${name}${suffix}`;
}

export function renderManager(state: ManagerState): string[] {
  const lines = [HEAVY_RULE, "       CLASPCTX - Account Management", HEAVY_RULE, ""];

  if (!state.accounts.length) {
    lines.push("  (No saved accounts)");
  } else {
    state.accounts.forEach((_, i) => lines.push(renderAccountLine(state, i)));
  }
  lines.push("");

  if (state.message) lines.push(state.message, "");

  lines.push(...LEGEND);
  return lines;
}
