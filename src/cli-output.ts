import { ClaspctxError } from "./errors";

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** One line for stderr; unexpected errors keep their class name so they stand out. */
export function formatCliError(error: unknown): string {
  if (error instanceof ClaspctxError) return `Error: ${error.message}`;
  if (error instanceof Error && error.name !== "Error") return `Error: ${error.name}: ${error.message}`;
  return `Error: ${toErrorMessage(error)}`;
}
