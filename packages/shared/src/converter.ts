import fs from "fs";
import path from "path";
import type {
  CompatBaseVirtualFolderV4,
  CompatFilesystemV4,
  CompatUserFiltersV4,
  CompatUserV2,
  CompatUserV4,
  CompatVirtualFolderV4,
  LegacyBackup,
  LegacyUserRecord,
} from "./compat-types";
import { decodeCompatSecret } from "./compat-secret";
import { DecodeError, SecretResolutionError, describeError } from "./errors";
import { consoleLogger, type Logger } from "./logger";
import type { Secret } from "./secret";
import {
  resolveLegacySecret,
  type LegacySecretSource,
  type SecretMigratorDeps,
} from "./secret-migrator";
import {
  FilesystemProvider,
  emptyUserFilters,
  type BaseVirtualFolder,
  type Filesystem,
  type User,
  type UserFilters,
  type VirtualFolder,
} from "./types";

export interface ConvertOptions {
  /** Directory holding the per-user `<username>_gcs_credentials.json` files */
  credentialsDir: string;
  logger?: Logger;
  readCredentialFile?: SecretMigratorDeps["readCredentialFile"];
  decodeCompatSecret?: SecretMigratorDeps["decodeCompatSecret"];
}

export interface ConversionFailure {
  username: string;
  error: unknown;
}

export interface ConvertedBackup {
  users: User[];
  folders: BaseVirtualFolder[];
  failures: ConversionFailure[];
}

export function gcsCredentialsPath(credentialsDir: string, username: string): string {
  return path.join(credentialsDir, `${username}_gcs_credentials.json`);
}

// Padded standard alphabet, the only form the legacy writer produced.
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function logSecretFailure(error: unknown, username: string, options: ConvertOptions): void {
  (options.logger ?? consoleLogger).log(
    "error",
    "unable to convert v4 filesystem for user %s: %s",
    username,
    describeError(error)
  );
}

function resolveProviderSecret(
  source: LegacySecretSource,
  username: string,
  field: string,
  options: ConvertOptions
): Secret {
  try {
    return resolveLegacySecret(source, { username, field }, {
      readCredentialFile: options.readCredentialFile ?? ((file) => fs.readFileSync(file)),
      decodeCompatSecret: options.decodeCompatSecret ?? decodeCompatSecret,
    });
  } catch (error) {
    logSecretFailure(error, username, options);
    throw error;
  }
}

function decodeInlineCredentials(value: string, username: string, options: ConvertOptions): Buffer {
  if (BASE64_PATTERN.test(value)) {
    return Buffer.from(value, "base64");
  }
  const field = "gcsconfig.credentials";
  const cause = new DecodeError("Inline credentials are not valid base64");
  const error = new SecretResolutionError(
    `Unable to decode ${field} of user "${username}": ${cause.message}`,
    { username, field, cause }
  );
  logSecretFailure(error, username, options);
  throw error;
}

/**
 * Translate the block selected by `provider`. Blocks of other providers are
 * left untouched: the legacy writer always serialized all of them.
 */
export function convertFsConfigFromV4(
  compatFs: CompatFilesystemV4,
  username: string,
  options: ConvertOptions
): Filesystem {
  switch (compatFs.provider) {
    case FilesystemProvider.Local:
      return { provider: FilesystemProvider.Local };

    case FilesystemProvider.S3: {
      const s3 = compatFs.s3config;
      return {
        provider: FilesystemProvider.S3,
        s3config: {
          bucket: s3.bucket ?? "",
          keyPrefix: s3.key_prefix ?? "",
          region: s3.region ?? "",
          accessKey: s3.access_key ?? "",
          accessSecret: resolveProviderSecret(
            { encoded: s3.access_secret },
            username,
            "s3config.access_secret",
            options
          ),
          endpoint: s3.endpoint ?? "",
          storageClass: s3.storage_class ?? "",
          uploadPartSize: s3.upload_part_size ?? 0,
          uploadConcurrency: s3.upload_concurrency ?? 0,
        },
      };
    }

    case FilesystemProvider.GCS: {
      const gcs = compatFs.gcsconfig;
      const automaticCredentials = gcs.automatic_credentials ?? 0;
      // Without automatic credentials, old setups kept the service account
      // file in the credentials directory under a fixed name.
      const credentialFile =
        automaticCredentials === 0
          ? gcsCredentialsPath(options.credentialsDir, username)
          : gcs.credential_file;
      return {
        provider: FilesystemProvider.GCS,
        gcsconfig: {
          bucket: gcs.bucket ?? "",
          keyPrefix: gcs.key_prefix ?? "",
          credentials: resolveProviderSecret(
            {
              plaintext: decodeInlineCredentials(gcs.credentials ?? "", username, options),
              credentialFile,
            },
            username,
            "gcsconfig.credentials",
            options
          ),
          automaticCredentials,
          storageClass: gcs.storage_class ?? "",
        },
      };
    }

    case FilesystemProvider.AzureBlob: {
      const az = compatFs.azblobconfig;
      return {
        provider: FilesystemProvider.AzureBlob,
        azblobconfig: {
          container: az.container ?? "",
          accountName: az.account_name ?? "",
          accountKey: resolveProviderSecret(
            { encoded: az.account_key },
            username,
            "azblobconfig.account_key",
            options
          ),
          endpoint: az.endpoint ?? "",
          sasUrl: az.sas_url ?? "",
          keyPrefix: az.key_prefix ?? "",
          uploadPartSize: az.upload_part_size ?? 0,
          uploadConcurrency: az.upload_concurrency ?? 0,
          useEmulator: az.use_emulator ?? false,
          accessTier: az.access_tier ?? "",
        },
      };
    }

    default:
      (options.logger ?? consoleLogger).log(
        "warn",
        "unknown filesystem provider %s for user %s, using the local filesystem",
        String(compatFs.provider),
        username
      );
      return { provider: FilesystemProvider.Local, originalProvider: compatFs.provider };
  }
}

function convertBaseFolderFromV4(folder: CompatBaseVirtualFolderV4): BaseVirtualFolder {
  return {
    id: folder.id,
    mappedPath: folder.mapped_path,
    usedQuotaSize: folder.used_quota_size,
    usedQuotaFiles: folder.used_quota_files,
    lastQuotaUpdate: folder.last_quota_update,
    users: [...(folder.users ?? [])],
  };
}

function convertVirtualFolderFromV4(folder: CompatVirtualFolderV4): VirtualFolder {
  return {
    ...convertBaseFolderFromV4(folder),
    virtualPath: folder.virtual_path,
    quotaSize: folder.quota_size,
    quotaFiles: folder.quota_files,
  };
}

function convertFiltersFromV4(filters: CompatUserFiltersV4): UserFilters {
  return {
    allowedIP: [...(filters.allowed_ip ?? [])],
    deniedIP: [...(filters.denied_ip ?? [])],
    deniedLoginMethods: [...(filters.denied_login_methods ?? [])],
    deniedProtocols: [...(filters.denied_protocols ?? [])],
    fileExtensions: (filters.file_extensions ?? []).map((filter) => ({
      path: filter.path,
      allowedExtensions: [...(filter.allowed_extensions ?? [])],
      deniedExtensions: [...(filter.denied_extensions ?? [])],
    })),
    filePatterns: (filters.file_patterns ?? []).map((filter) => ({
      path: filter.path,
      allowedPatterns: [...(filter.allowed_patterns ?? [])],
      deniedPatterns: [...(filter.denied_patterns ?? [])],
    })),
    maxUploadFileSize: filters.max_upload_file_size ?? 0,
  };
}

/**
 * V2 accounts had no filesystem config and a single permission list that
 * applied to the whole home directory.
 */
export function convertUserFromV2(user: CompatUserV2): User {
  return {
    id: user.id,
    status: user.status,
    username: user.username,
    expirationDate: user.expiration_date,
    password: user.password ?? "",
    publicKeys: [...(user.public_keys ?? [])],
    homeDir: user.home_dir,
    virtualFolders: [],
    uid: user.uid,
    gid: user.gid,
    maxSessions: user.max_sessions,
    quotaSize: user.quota_size,
    quotaFiles: user.quota_files,
    permissions: { "/": [...user.permissions] },
    usedQuotaSize: user.used_quota_size,
    usedQuotaFiles: user.used_quota_files,
    lastQuotaUpdate: user.last_quota_update,
    uploadBandwidth: user.upload_bandwidth,
    downloadBandwidth: user.download_bandwidth,
    lastLogin: user.last_login,
    filters: emptyUserFilters(),
    fsConfig: { provider: FilesystemProvider.Local },
  };
}

/**
 * @throws SecretResolutionError when a secret of the active filesystem
 * provider cannot be resolved. Nothing is returned in that case.
 */
export function convertUserFromV4(user: CompatUserV4, options: ConvertOptions): User {
  const fsConfig = convertFsConfigFromV4(user.filesystem, user.username, options);

  // fromEntries defines own keys, so a "__proto__" directory survives.
  const permissions: Record<string, string[]> = Object.fromEntries(
    Object.entries(user.permissions).map(([dir, perms]): [string, string[]] => [dir, [...perms]])
  );

  return {
    id: user.id,
    status: user.status,
    username: user.username,
    expirationDate: user.expiration_date,
    password: user.password ?? "",
    publicKeys: [...(user.public_keys ?? [])],
    homeDir: user.home_dir,
    virtualFolders: (user.virtual_folders ?? []).map(convertVirtualFolderFromV4),
    uid: user.uid,
    gid: user.gid,
    maxSessions: user.max_sessions,
    quotaSize: user.quota_size,
    quotaFiles: user.quota_files,
    permissions,
    usedQuotaSize: user.used_quota_size,
    usedQuotaFiles: user.used_quota_files,
    lastQuotaUpdate: user.last_quota_update,
    uploadBandwidth: user.upload_bandwidth,
    downloadBandwidth: user.download_bandwidth,
    lastLogin: user.last_login,
    filters: convertFiltersFromV4(user.filters),
    fsConfig,
  };
}

export function convertLegacyUser(record: LegacyUserRecord, options: ConvertOptions): User {
  switch (record.version) {
    case 2:
      return convertUserFromV2(record.user);
    case 4:
      return convertUserFromV4(record.user, options);
  }
}

/**
 * Convert every account of a backup independently. A failing account is
 * reported in `failures` and does not stop the others; whether to keep the
 * partial result is the caller's call.
 */
export function convertLegacyBackup(legacy: LegacyBackup, options: ConvertOptions): ConvertedBackup {
  const records: LegacyUserRecord[] =
    legacy.version === 2
      ? legacy.backup.users.map((user): LegacyUserRecord => ({ version: 2, user }))
      : legacy.backup.users.map((user): LegacyUserRecord => ({ version: 4, user }));
  const result: ConvertedBackup = {
    users: [],
    folders: legacy.version === 4 ? legacy.backup.folders.map(convertBaseFolderFromV4) : [],
    failures: [],
  };

  for (const record of records) {
    try {
      result.users.push(convertLegacyUser(record, options));
    } catch (error) {
      result.failures.push({ username: record.user.username, error });
    }
  }

  return result;
}
