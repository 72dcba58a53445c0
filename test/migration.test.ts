import { afterEach, describe, expect, test } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { resolveAccountForProject } from "../src/bootstrap";
import { detectLegacyProject, migrateLegacyProject, readLegacyDeploymentId } from "../src/migration";
import { storeIdentity } from "../src/vault";
import { bytes, createFakeIo, createFakeLogin, readText, setupSandbox, teardownSandbox } from "./helpers";

afterEach(async () => {
  await teardownSandbox();
});

describe("legacy project migration", () => {
  test("detects deploymentId.txt only while claspConfig.txt is missing", async () => {
    const { cwd } = await setupSandbox();
    expect(await detectLegacyProject(cwd)).toBe(false);

    await fs.writeFile(path.join(cwd, "deploymentId.txt"), "AKfy1\n");
    expect(await detectLegacyProject(cwd)).toBe(true);

    await fs.writeFile(path.join(cwd, "claspConfig.txt"), "account=work\n");
    expect(await detectLegacyProject(cwd)).toBe(false);
  });

  test("trims whitespace and carriage returns from the legacy value", async () => {
    const { cwd } = await setupSandbox();
    const file = path.join(cwd, "deploymentId.txt");
    await fs.writeFile(file, "  AKfycbwTEST123  \r");

    expect(await readLegacyDeploymentId(file)).toBe("AKfycbwTEST123");
  });

  test("writes the new config and removes the legacy file", async () => {
    const { cwd } = await setupSandbox();
    await storeIdentity("work", bytes("{}"));
    await fs.writeFile(path.join(cwd, "deploymentId.txt"), "  AKfycbwTEST123  \r");
    const io = createFakeIo(["1"]);

    const result = await migrateLegacyProject({ cwd, io, login: createFakeLogin() });

    expect(result).toEqual({ deploymentId: "AKfycbwTEST123", account: "work" });
    expect(await readText(path.join(cwd, "claspConfig.txt"))).toBe("deploymentId=AKfycbwTEST123\naccount=work\n");
    await expect(fs.stat(path.join(cwd, "deploymentId.txt"))).rejects.toHaveProperty("code", "ENOENT");
  });

  test("skips an empty deployment id", async () => {
    const { cwd } = await setupSandbox();
    await storeIdentity("work", bytes("{}"));
    await fs.writeFile(path.join(cwd, "deploymentId.txt"), " \r\n");

    await migrateLegacyProject({ cwd, io: createFakeIo(["1"]), login: createFakeLogin() });

    expect(await readText(path.join(cwd, "claspConfig.txt"))).toBe("account=work\n");
  });

  test("runs once: a second resolution reads the migrated config without prompting", async () => {
    const { cwd } = await setupSandbox();
    await storeIdentity("work", bytes("{}"));
    await fs.writeFile(path.join(cwd, "deploymentId.txt"), "AKfycbwTEST123\n");

    const first = createFakeIo(["1"]);
    expect(await resolveAccountForProject({ cwd, io: first, login: createFakeLogin() })).toBe("work");
    expect(first.said).toContain("Old deploymentId.txt file detected. Migrating to the new format...");

    const second = createFakeIo();
    expect(await resolveAccountForProject({ cwd, io: second, login: createFakeLogin() })).toBe("work");
    expect(second.events).toEqual([]);
    expect(await readText(path.join(cwd, "claspConfig.txt"))).toBe("deploymentId=AKfycbwTEST123\naccount=work\n");
  });
});
