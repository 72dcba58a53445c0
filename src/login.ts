import { ExternalToolError } from "./errors";
import { safeReadFileBytes } from "./lib/fs-atomic";
import { claspCredentialsPath } from "./paths";
import { ensureClaspInstalled, runClasp } from "./run-clasp";
import type { CredentialBlob } from "./types";

/** Runs an interactive login and hands back the credentials it produced. */
export type LoginProvider = {
  login: () => Promise<CredentialBlob>;
};

export const claspLogin: LoginProvider = {
  login: async () => {
    await ensureClaspInstalled();
    // Blocks until the operator finishes the browser flow.
    const exitCode = await runClasp(["login"], { stdoutToStderr: true });
    if (exitCode !== 0) throw new ExternalToolError("clasp login failed", exitCode);

    const credentialsPath = claspCredentialsPath();
    const credentials = await safeReadFileBytes(credentialsPath);
    if (!credentials) throw new ExternalToolError(`Credentials not found in ${credentialsPath}`);
    return credentials;
  },
};
