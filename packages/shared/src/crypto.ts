// Sealing of resolved secrets for storage at rest (AES-256-GCM, Node crypto)
import crypto from "crypto";
import { SecretSealError } from "./errors";
import type { Secret } from "./secret";
import { FilesystemProvider, type Filesystem, type User } from "./types";

const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const SEALING_INFO = "compat-bridge:secrets";

export function deriveSealingKey(masterSecret: string | Uint8Array): Buffer {
  return Buffer.from(crypto.hkdfSync("sha256", masterSecret, new Uint8Array(32), SEALING_INFO, 32));
}

export function sealSecret(secret: Secret, key: Uint8Array, additionalData?: string): Secret {
  if (secret.status !== "plain") {
    return secret;
  }
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv("aes-256-gcm", key, iv);
  if (additionalData) {
    cipher.setAAD(Buffer.from(additionalData, "utf8"));
  }
  const ciphertext = Buffer.concat([cipher.update(secret.payload, "utf8"), cipher.final()]);
  // IV || ciphertext || tag
  const payload = Buffer.concat([iv, ciphertext, cipher.getAuthTag()]).toString("hex");
  return { status: "aes-256-gcm", payload, additionalData };
}

export function openSecret(secret: Secret, key: Uint8Array): Secret {
  if (secret.status !== "aes-256-gcm") {
    return secret;
  }
  const data = Buffer.from(secret.payload, "hex");
  if (data.length < IV_LENGTH + TAG_LENGTH) {
    throw new SecretSealError("Sealed secret payload is too short");
  }
  try {
    const decipher = crypto.createDecipheriv("aes-256-gcm", key, data.subarray(0, IV_LENGTH));
    if (secret.additionalData) {
      decipher.setAAD(Buffer.from(secret.additionalData, "utf8"));
    }
    decipher.setAuthTag(data.subarray(data.length - TAG_LENGTH));
    const plaintext = Buffer.concat([
      decipher.update(data.subarray(IV_LENGTH, data.length - TAG_LENGTH)),
      decipher.final(),
    ]);
    return { status: "plain", payload: plaintext.toString("utf8") };
  } catch (error) {
    throw new SecretSealError("Unable to open sealed secret", { cause: error });
  }
}

function mapFsSecrets(fsConfig: Filesystem, map: (secret: Secret) => Secret): Filesystem {
  switch (fsConfig.provider) {
    case FilesystemProvider.Local:
      return fsConfig;
    case FilesystemProvider.S3:
      return {
        ...fsConfig,
        s3config: { ...fsConfig.s3config, accessSecret: map(fsConfig.s3config.accessSecret) },
      };
    case FilesystemProvider.GCS:
      return {
        ...fsConfig,
        gcsconfig: { ...fsConfig.gcsconfig, credentials: map(fsConfig.gcsconfig.credentials) },
      };
    case FilesystemProvider.AzureBlob:
      return {
        ...fsConfig,
        azblobconfig: { ...fsConfig.azblobconfig, accountKey: map(fsConfig.azblobconfig.accountKey) },
      };
  }
}

/**
 * Seal every plain secret of the user's filesystem config, bound to the
 * username so a sealed value cannot be moved to another account.
 */
export function sealUserSecrets(user: User, key: Uint8Array): User {
  return {
    ...user,
    fsConfig: mapFsSecrets(user.fsConfig, (secret) => sealSecret(secret, key, user.username)),
  };
}

export function mapUserSecrets(user: User, map: (secret: Secret) => Secret): User {
  return { ...user, fsConfig: mapFsSecrets(user.fsConfig, map) };
}
