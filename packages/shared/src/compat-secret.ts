import crypto from "crypto";
import { DecodeError } from "./errors";
import { plainSecret, type Secret } from "./secret";

// Older releases stored secrets inline as "$aes$<key>$<hex>", the 32 key
// characters being used as-is for AES-256-GCM and the hex part holding
// nonce || ciphertext || tag.
const COMPAT_ALGORITHM = "aes";
const KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

export function isCompatSecretString(value: string): boolean {
  return value.startsWith(`$${COMPAT_ALGORITHM}$`);
}

export function decodeCompatSecret(value: string): Secret {
  const parts = value.split("$");
  if (parts.length !== 4 || parts[0] !== "") {
    throw new DecodeError("Encoded secret is not in the expected format");
  }
  const [, algorithm, key, data] = parts;
  if (algorithm !== COMPAT_ALGORITHM) {
    throw new DecodeError(`Unsupported encoded secret algorithm "${algorithm}"`);
  }
  if (Buffer.byteLength(key) !== KEY_LENGTH) {
    throw new DecodeError("Encoded secret has an invalid key length");
  }
  if (!HEX_PATTERN.test(data)) {
    throw new DecodeError("Encoded secret payload is not hex encoded");
  }

  const encrypted = Buffer.from(data, "hex");
  if (encrypted.length < NONCE_LENGTH + TAG_LENGTH) {
    throw new DecodeError("Encoded secret payload is too short");
  }
  const nonce = encrypted.subarray(0, NONCE_LENGTH);
  const ciphertext = encrypted.subarray(NONCE_LENGTH, encrypted.length - TAG_LENGTH);
  const tag = encrypted.subarray(encrypted.length - TAG_LENGTH);

  try {
    const decipher = crypto.createDecipheriv("aes-256-gcm", Buffer.from(key), nonce);
    decipher.setAuthTag(tag);
    const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    return plainSecret(plaintext.toString("utf8"));
  } catch (error) {
    throw new DecodeError("Unable to decrypt encoded secret", { cause: error });
  }
}

/**
 * Write `plaintext` in the legacy inline format. A random key is generated
 * when none is given.
 */
export function encodeCompatSecret(
  plaintext: string,
  key: string = crypto.randomBytes(KEY_LENGTH / 2).toString("hex")
): string {
  if (Buffer.byteLength(key) !== KEY_LENGTH) {
    throw new DecodeError("Encoded secret key must be 32 bytes");
  }
  const nonce = crypto.randomBytes(NONCE_LENGTH);
  const cipher = crypto.createCipheriv("aes-256-gcm", Buffer.from(key), nonce);
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  const encrypted = Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
  return `$${COMPAT_ALGORITHM}$${key}$${encrypted.toString("hex")}`;
}
