import { writeFileAtomicBytes } from "./lib/fs-atomic";
import { withActivationLock } from "./lock";
import { claspCredentialsPath } from "./paths";
import { fetchIdentity } from "./vault";

/**
 * Copies the stored credentials of `account` over clasp's credentials file.
 * Throws NotFoundError when the vault has no such account; nothing is
 * written in that case.
 */
export async function activateIdentity(account: string): Promise<void> {
  const identity = await fetchIdentity(account);
  await withActivationLock(account, async () => {
    await writeFileAtomicBytes(claspCredentialsPath(), identity.credentials, { mode: 0o600 });
  });
}
