export type ErrorCode = "VALIDATION" | "NOT_FOUND" | "EXTERNAL_TOOL" | "ENVIRONMENT" | "IO";

export class ClaspctxError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClaspctxError";
    this.code = code;
  }
}

/** Malformed user input. Reported and re-prompted, never fatal. */
export class ValidationError extends ClaspctxError {
  constructor(message: string) {
    super(message, "VALIDATION");
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ClaspctxError {
  readonly account: string;

  constructor(account: string) {
    super(`Credentials not found for account: ${account}`, "NOT_FOUND");
    this.name = "NotFoundError";
    this.account = account;
  }
}

export class ExternalToolError extends ClaspctxError {
  readonly exitCode?: number;

  constructor(message: string, exitCode?: number) {
    super(message, "EXTERNAL_TOOL");
    this.name = "ExternalToolError";
    this.exitCode = exitCode;
  }
}

/** Something the process needs before it can start is missing (a TTY, clasp on the PATH). */
export class EnvironmentError extends ClaspctxError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "ENVIRONMENT", options);
    this.name = "EnvironmentError";
  }
}

export class IoError extends ClaspctxError {
  readonly path: string;

  constructor(message: string, filePath: string, cause: unknown) {
    super(message, "IO", { cause });
    this.name = "IoError";
    this.path = filePath;
  }
}

export function errnoCode(error: unknown): string | undefined {
  return (error as NodeJS.ErrnoException | undefined)?.code;
}
