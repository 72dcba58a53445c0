import { afterEach, describe, expect, test } from "vitest";
import { ExternalToolError, ValidationError } from "../src/errors";
import {
  assertNewAccountName,
  createAccount,
  createAccountInteractive,
  formatAccountList,
  isValidAccountName,
  listAccounts,
  promptAccountSelection,
} from "../src/profiles";
import { fetchIdentity, listIdentities, storeIdentity } from "../src/vault";
import { bytes, createFakeIo, createFakeLogin, setupSandbox, teardownSandbox } from "./helpers";

afterEach(async () => {
  await teardownSandbox();
});

describe("account names", () => {
  test("accepts letters, digits, hyphens and underscores", () => {
    expect(isValidAccountName("client-abc_2")).toBe(true);
    expect(isValidAccountName("Work")).toBe(true);
  });

  test("rejects anything else", () => {
    for (const name of ["", "bad name", "a/b", "../up", "dot.name", "ñandu"]) {
      expect(isValidAccountName(name)).toBe(false);
    }
  });

  test("rejects names already in the vault", async () => {
    await setupSandbox();
    await storeIdentity("work", bytes("{}"));

    await expect(assertNewAccountName("work")).rejects.toThrow("An account with that name already exists.");
    await expect(assertNewAccountName("personal")).resolves.toBeUndefined();
  });
});

describe("createAccount", () => {
  test("stores what the login produced under the new name", async () => {
    await setupSandbox();
    const io = createFakeIo([""]);
    const login = createFakeLogin('{"token":"work-token"}');

    const created = await createAccount({ io, login }, "work");
    const fetched = await fetchIdentity("work");

    expect(created.name).toBe("work");
    expect(Buffer.from(fetched.credentials).toString("utf8")).toBe('{"token":"work-token"}');
    expect(login.calls).toBe(1);
    expect(io.asked).toEqual(["Press Enter when ready to continue..."]);
    expect(io.said).toContain("Credentials saved for account: work");
  });

  test("validates before logging in", async () => {
    await setupSandbox();
    const login = createFakeLogin();

    await expect(createAccount({ io: createFakeIo(), login }, "bad name")).rejects.toBeInstanceOf(ValidationError);
    expect(login.calls).toBe(0);
  });

  test("writes nothing when the login fails", async () => {
    await setupSandbox();
    const login = createFakeLogin(new ExternalToolError("clasp login failed", 1));

    await expect(createAccount({ io: createFakeIo([""]), login }, "work")).rejects.toThrow("clasp login failed");
    expect(await listIdentities()).toEqual([]);
  });
});

describe("createAccountInteractive", () => {
  test("keeps asking until the name is valid and unused", async () => {
    await setupSandbox();
    await storeIdentity("work", bytes("{}"));
    const io = createFakeIo(["bad name", "work", "fresh", ""]);
    const login = createFakeLogin();

    const identity = await createAccountInteractive({ io, login });

    expect(identity.name).toBe("fresh");
    expect(io.warned).toEqual([
      "Invalid name. Use only letters, numbers, hyphens and underscores.",
      "An account with that name already exists.",
    ]);
    expect(login.calls).toBe(1);
    expect(await listIdentities()).toEqual(["fresh", "work"]);
  });

  test("announces the credentials directory when it creates it", async () => {
    await setupSandbox();
    const io = createFakeIo(["work", ""]);

    await createAccountInteractive({ io, login: createFakeLogin() });

    expect(io.warned).toHaveLength(1);
    expect(io.warned[0]).toMatch(/^Created credentials directory: .*accounts$/);
  });
});

describe("promptAccountSelection", () => {
  test("returns the numbered account after rejecting bad input", async () => {
    await setupSandbox();
    await storeIdentity("alpha", bytes("{}"));
    await storeIdentity("beta", bytes("{}"));
    const io = createFakeIo(["7", "x", "0", "2"]);

    const picked = await promptAccountSelection({ io, login: createFakeLogin() });

    expect(picked).toBe("beta");
    expect(io.warned).toEqual([
      "Invalid selection. Try again.",
      "Invalid selection. Try again.",
      "Invalid selection. Try again.",
    ]);
    expect(io.said).toContain("  1) alpha");
    expect(io.said).toContain("  2) beta");
  });

  test("offers only account creation when the vault is empty", async () => {
    await setupSandbox();
    const io = createFakeIo(["n", "work", ""]);

    const picked = await promptAccountSelection({ io, login: createFakeLogin() });

    expect(picked).toBe("work");
    expect(io.said).toContain("  (No saved accounts)");
    expect(io.said).toContain("  N) Create new account");
    expect(io.said.filter((line) => /^ {2}\d+\)/.test(line))).toEqual([]);
  });
});

describe("listing", () => {
  test("marks the project's account", async () => {
    await setupSandbox();
    await storeIdentity("work", bytes("{}"));
    await storeIdentity("personal", bytes("{}"));

    const accounts = await listAccounts("work");

    expect(accounts).toEqual([
      { name: "personal", isActive: false },
      { name: "work", isActive: true },
    ]);
    expect(formatAccountList(accounts)).toEqual(["personal", "work (active)"]);
  });

  test("explains how to add an account when there are none", () => {
    expect(formatAccountList([])).toEqual(["No saved accounts.", "Use 'claspctx --edit' to add an account."]);
  });
});
