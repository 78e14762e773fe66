import { DecodeError, SecretResolutionError, describeError } from "./errors";
import { emptySecret, plainSecret, type Secret } from "./secret";

/**
 * The raw state of one legacy secret field. Later legacy sub-versions may
 * fill in more than one source, so resolution checks them in a fixed order.
 */
export interface LegacySecretSource {
  plaintext?: string | Uint8Array;
  credentialFile?: string;
  encoded?: string;
}

export interface SecretMigrationContext {
  username: string;
  field: string;
}

export interface SecretMigratorDeps {
  readCredentialFile: (path: string) => Uint8Array | string;
  decodeCompatSecret: (value: string) => Secret;
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Payloads are strings, so only bytes that are valid UTF-8 come through
 * unchanged. Anything else is rejected rather than replaced with U+FFFD.
 */
function toText(value: Uint8Array | string): string {
  if (typeof value === "string") {
    return value;
  }
  try {
    return utf8.decode(value);
  } catch (error) {
    throw new DecodeError("Secret bytes are not valid UTF-8", { cause: error });
  }
}

/**
 * Resolve a legacy secret into a current one.
 *
 * Priority: inline plaintext, then the credential file, then the encoded
 * string. Nothing set yields an unset secret, which is valid (public
 * buckets need no credential).
 *
 * @throws SecretResolutionError when the file cannot be read, the bytes are
 * not UTF-8 or the encoded string cannot be decoded; the original error is
 * its `cause`.
 */
export function resolveLegacySecret(
  source: LegacySecretSource,
  context: SecretMigrationContext,
  deps: SecretMigratorDeps
): Secret {
  const { plaintext, credentialFile, encoded } = source;

  if (plaintext !== undefined && plaintext.length > 0) {
    try {
      return plainSecret(toText(plaintext));
    } catch (error) {
      throw new SecretResolutionError(
        `Unable to decode ${context.field} of user "${context.username}": ${describeError(error)}`,
        { ...context, cause: error }
      );
    }
  }

  if (credentialFile) {
    let contents: Uint8Array | string;
    try {
      contents = deps.readCredentialFile(credentialFile);
    } catch (error) {
      throw new SecretResolutionError(
        `Unable to read credential file "${credentialFile}" for ${context.field} of user "${context.username}": ${describeError(error)}`,
        { ...context, path: credentialFile, cause: error }
      );
    }
    try {
      return plainSecret(toText(contents));
    } catch (error) {
      throw new SecretResolutionError(
        `Unable to decode credential file "${credentialFile}" for ${context.field} of user "${context.username}": ${describeError(error)}`,
        { ...context, path: credentialFile, cause: error }
      );
    }
  }

  if (encoded) {
    try {
      return deps.decodeCompatSecret(encoded);
    } catch (error) {
      throw new SecretResolutionError(
        `Unable to decode ${context.field} of user "${context.username}": ${describeError(error)}`,
        { ...context, cause: error }
      );
    }
  }

  return emptySecret();
}
