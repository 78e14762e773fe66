export * from "./types";
export * from "./secret";
export * from "./errors";
export * from "./logger";
export type * from "./compat-types";

export {
  readCompatUserV2,
  readCompatUserV4,
  readCompatBackupV2,
  readCompatBackupV4,
  readLegacyBackup,
} from "./compat-reader";
export { decodeCompatSecret, encodeCompatSecret, isCompatSecretString } from "./compat-secret";
export { resolveLegacySecret } from "./secret-migrator";
export type { LegacySecretSource, SecretMigrationContext, SecretMigratorDeps } from "./secret-migrator";
export {
  convertUserFromV2,
  convertUserFromV4,
  convertFsConfigFromV4,
  convertLegacyUser,
  convertLegacyBackup,
  gcsCredentialsPath,
} from "./converter";
export type { ConvertOptions, ConvertedBackup, ConversionFailure } from "./converter";
export { deriveSealingKey, sealSecret, openSecret, sealUserSecrets, mapUserSecrets } from "./crypto";
