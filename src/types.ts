/** Serialized clasp token set. Copied around as-is, never parsed. */
export type CredentialBlob = Uint8Array;

export type Identity = {
  name: string;
  credentials: CredentialBlob;
};

export type ProjectConfigKey = "account" | "deploymentId";

export type AccountListEntry = {
  name: string;
  isActive: boolean;
};
