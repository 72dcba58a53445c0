import { fileExists, safeReadFileUtf8, safeUnlink } from "./lib/fs-atomic";
import { LEGACY_DEPLOYMENT_FILE, legacyDeploymentPath, PROJECT_CONFIG_FILE } from "./paths";
import { hasProjectConfig, writeProjectValue } from "./project-config";
import { promptAccountSelection, type AccountContext } from "./profiles";

export type ProjectContext = AccountContext & {
  cwd: string;
};

export type MigrationResult = {
  deploymentId: string;
  account: string;
};

/** A legacy project has deploymentId.txt and no claspConfig.txt yet. */
export async function detectLegacyProject(cwd: string): Promise<boolean> {
  if (await hasProjectConfig(cwd)) return false;
  return await fileExists(legacyDeploymentPath(cwd));
}

export async function readLegacyDeploymentId(filePath: string): Promise<string> {
  const raw = (await safeReadFileUtf8(filePath)) ?? "";
  return raw.replace(/\r/g, "").trim();
}

/**
 * Moves the deployment id into claspConfig.txt, attaches an account, and
 * deletes deploymentId.txt. The config file is written before the legacy
 * file goes away, so an interrupted run is picked up as a configured project.
 */
export async function migrateLegacyProject(ctx: ProjectContext): Promise<MigrationResult> {
  ctx.io.say();
  ctx.io.say(`Old ${LEGACY_DEPLOYMENT_FILE} file detected. Migrating to the new format...`);

  const legacyPath = legacyDeploymentPath(ctx.cwd);
  const deploymentId = await readLegacyDeploymentId(legacyPath);
  const account = await promptAccountSelection(ctx);

  if (deploymentId) await writeProjectValue(ctx.cwd, "deploymentId", deploymentId);
  await writeProjectValue(ctx.cwd, "account", account);
  await safeUnlink(legacyPath);

  ctx.io.say();
  ctx.io.say(`Migration completed. New file: ${PROJECT_CONFIG_FILE}`);
  ctx.io.say(`Old file deleted: ${LEGACY_DEPLOYMENT_FILE}`);
  return { deploymentId, account };
}
