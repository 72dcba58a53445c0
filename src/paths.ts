import os from "node:os";
import path from "node:path";

export const PROJECT_CONFIG_FILE = "claspConfig.txt";
export const LEGACY_DEPLOYMENT_FILE = "deploymentId.txt";
export const IDENTITY_FILE_EXTENSION = ".json";

function homeDir(): string {
  // Prefer env HOME for predictable behavior in shells/tests.
  const envHome = process.env.HOME;
  if (envHome && envHome.trim()) return envHome;
  return os.homedir();
}

export function claspctxHomeDir(): string {
  const override = process.env.CLASPCTX_HOME;
  if (override && override.trim()) return path.resolve(override);

  return path.join(homeDir(), ".config", "claspctx");
}

export function vaultDir(): string {
  return path.join(claspctxHomeDir(), "accounts");
}

export function identityPath(accountName: string): string {
  return path.join(vaultDir(), `${accountName}${IDENTITY_FILE_EXTENSION}`);
}

export function locksDir(): string {
  return path.join(claspctxHomeDir(), "locks");
}

export function activationLockDir(): string {
  return path.join(locksDir(), "activate.lockdir");
}

/** The credentials file clasp reads on every run and writes on `clasp login`. */
export function claspCredentialsPath(): string {
  return path.join(homeDir(), ".clasprc.json");
}

export function projectConfigPath(cwd: string): string {
  return path.join(cwd, PROJECT_CONFIG_FILE);
}

export function legacyDeploymentPath(cwd: string): string {
  return path.join(cwd, LEGACY_DEPLOYMENT_FILE);
}
