import type {
  CompatAzBlobFsConfigV4,
  CompatBackupV2,
  CompatBackupV4,
  CompatBaseVirtualFolderV4,
  CompatExtensionsFilterV4,
  CompatFilesystemV4,
  CompatGCSFsConfigV4,
  CompatPatternsFilterV4,
  CompatS3FsConfigV4,
  CompatUserFiltersV4,
  CompatUserV2,
  CompatUserV4,
  CompatVirtualFolderV4,
  LegacyBackup,
} from "./compat-types";
import { UnsupportedVersionError } from "./errors";

/*
 * Structural reading of already-parsed backup JSON. Every field is read with
 * the JSON type the legacy writer used; anything missing or of another type
 * becomes that type's zero value. Values are never checked for sense: that
 * is left to whoever consumes the converted record.
 */

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): JsonObject {
  return isRecord(value) ? value : {};
}

function readNumber(obj: JsonObject, key: string): number {
  const value = obj[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function readString(obj: JsonObject, key: string): string {
  const value = obj[key];
  return typeof value === "string" ? value : "";
}

function readBoolean(obj: JsonObject, key: string): boolean {
  return obj[key] === true;
}

function readStringArray(obj: JsonObject, key: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}

function readObjectArray<T>(obj: JsonObject, key: string, read: (item: JsonObject) => T): T[] {
  const value = obj[key];
  if (!Array.isArray(value)) return [];
  return value.map((item) => read(asRecord(item)));
}

function readPermissionsMap(obj: JsonObject, key: string): Record<string, string[]> {
  const source = asRecord(obj[key]);
  return Object.fromEntries(
    Object.keys(source).map((path): [string, string[]] => [path, readStringArray(source, path)])
  );
}

export function readCompatUserV2(raw: unknown): CompatUserV2 {
  const obj = asRecord(raw);
  return {
    id: readNumber(obj, "id"),
    username: readString(obj, "username"),
    password: readString(obj, "password"),
    public_keys: readStringArray(obj, "public_keys"),
    home_dir: readString(obj, "home_dir"),
    uid: readNumber(obj, "uid"),
    gid: readNumber(obj, "gid"),
    max_sessions: readNumber(obj, "max_sessions"),
    quota_size: readNumber(obj, "quota_size"),
    quota_files: readNumber(obj, "quota_files"),
    permissions: readStringArray(obj, "permissions"),
    used_quota_size: readNumber(obj, "used_quota_size"),
    used_quota_files: readNumber(obj, "used_quota_files"),
    last_quota_update: readNumber(obj, "last_quota_update"),
    upload_bandwidth: readNumber(obj, "upload_bandwidth"),
    download_bandwidth: readNumber(obj, "download_bandwidth"),
    expiration_date: readNumber(obj, "expiration_date"),
    last_login: readNumber(obj, "last_login"),
    status: readNumber(obj, "status"),
  };
}

function readS3Config(obj: JsonObject): CompatS3FsConfigV4 {
  return {
    bucket: readString(obj, "bucket"),
    key_prefix: readString(obj, "key_prefix"),
    region: readString(obj, "region"),
    access_key: readString(obj, "access_key"),
    access_secret: readString(obj, "access_secret"),
    endpoint: readString(obj, "endpoint"),
    storage_class: readString(obj, "storage_class"),
    upload_part_size: readNumber(obj, "upload_part_size"),
    upload_concurrency: readNumber(obj, "upload_concurrency"),
  };
}

function readGCSConfig(obj: JsonObject): CompatGCSFsConfigV4 {
  // credential_file was excluded from serialization by the legacy writer
  return {
    bucket: readString(obj, "bucket"),
    key_prefix: readString(obj, "key_prefix"),
    credentials: readString(obj, "credentials"),
    automatic_credentials: readNumber(obj, "automatic_credentials"),
    storage_class: readString(obj, "storage_class"),
  };
}

function readAzBlobConfig(obj: JsonObject): CompatAzBlobFsConfigV4 {
  return {
    container: readString(obj, "container"),
    account_name: readString(obj, "account_name"),
    account_key: readString(obj, "account_key"),
    endpoint: readString(obj, "endpoint"),
    sas_url: readString(obj, "sas_url"),
    key_prefix: readString(obj, "key_prefix"),
    upload_part_size: readNumber(obj, "upload_part_size"),
    upload_concurrency: readNumber(obj, "upload_concurrency"),
    use_emulator: readBoolean(obj, "use_emulator"),
    access_tier: readString(obj, "access_tier"),
  };
}

function readFilesystem(obj: JsonObject): CompatFilesystemV4 {
  return {
    provider: readNumber(obj, "provider"),
    s3config: readS3Config(asRecord(obj.s3config)),
    gcsconfig: readGCSConfig(asRecord(obj.gcsconfig)),
    azblobconfig: readAzBlobConfig(asRecord(obj.azblobconfig)),
  };
}

function readBaseVirtualFolder(obj: JsonObject): CompatBaseVirtualFolderV4 {
  return {
    id: readNumber(obj, "id"),
    mapped_path: readString(obj, "mapped_path"),
    used_quota_size: readNumber(obj, "used_quota_size"),
    used_quota_files: readNumber(obj, "used_quota_files"),
    last_quota_update: readNumber(obj, "last_quota_update"),
    users: readStringArray(obj, "users"),
  };
}

function readVirtualFolder(obj: JsonObject): CompatVirtualFolderV4 {
  return {
    ...readBaseVirtualFolder(obj),
    virtual_path: readString(obj, "virtual_path"),
    quota_size: readNumber(obj, "quota_size"),
    quota_files: readNumber(obj, "quota_files"),
  };
}

function readExtensionsFilter(obj: JsonObject): CompatExtensionsFilterV4 {
  return {
    path: readString(obj, "path"),
    allowed_extensions: readStringArray(obj, "allowed_extensions"),
    denied_extensions: readStringArray(obj, "denied_extensions"),
  };
}

function readPatternsFilter(obj: JsonObject): CompatPatternsFilterV4 {
  return {
    path: readString(obj, "path"),
    allowed_patterns: readStringArray(obj, "allowed_patterns"),
    denied_patterns: readStringArray(obj, "denied_patterns"),
  };
}

function readFilters(obj: JsonObject): CompatUserFiltersV4 {
  return {
    allowed_ip: readStringArray(obj, "allowed_ip"),
    denied_ip: readStringArray(obj, "denied_ip"),
    denied_login_methods: readStringArray(obj, "denied_login_methods"),
    denied_protocols: readStringArray(obj, "denied_protocols"),
    file_extensions: readObjectArray(obj, "file_extensions", readExtensionsFilter),
    file_patterns: readObjectArray(obj, "file_patterns", readPatternsFilter),
    max_upload_file_size: readNumber(obj, "max_upload_file_size"),
  };
}

export function readCompatUserV4(raw: unknown): CompatUserV4 {
  const obj = asRecord(raw);
  return {
    id: readNumber(obj, "id"),
    status: readNumber(obj, "status"),
    username: readString(obj, "username"),
    expiration_date: readNumber(obj, "expiration_date"),
    password: readString(obj, "password"),
    public_keys: readStringArray(obj, "public_keys"),
    home_dir: readString(obj, "home_dir"),
    virtual_folders: readObjectArray(obj, "virtual_folders", readVirtualFolder),
    uid: readNumber(obj, "uid"),
    gid: readNumber(obj, "gid"),
    max_sessions: readNumber(obj, "max_sessions"),
    quota_size: readNumber(obj, "quota_size"),
    quota_files: readNumber(obj, "quota_files"),
    permissions: readPermissionsMap(obj, "permissions"),
    used_quota_size: readNumber(obj, "used_quota_size"),
    used_quota_files: readNumber(obj, "used_quota_files"),
    last_quota_update: readNumber(obj, "last_quota_update"),
    upload_bandwidth: readNumber(obj, "upload_bandwidth"),
    download_bandwidth: readNumber(obj, "download_bandwidth"),
    last_login: readNumber(obj, "last_login"),
    filters: readFilters(asRecord(obj.filters)),
    filesystem: readFilesystem(asRecord(obj.filesystem)),
  };
}

export function readCompatBackupV2(raw: unknown): CompatBackupV2 {
  const obj = asRecord(raw);
  return {
    users: Array.isArray(obj.users) ? obj.users.map(readCompatUserV2) : [],
  };
}

export function readCompatBackupV4(raw: unknown): CompatBackupV4 {
  const obj = asRecord(raw);
  return {
    users: Array.isArray(obj.users) ? obj.users.map(readCompatUserV4) : [],
    folders: readObjectArray(obj, "folders", readBaseVirtualFolder),
  };
}

/**
 * Read a whole backup written under `version`. The version comes from the
 * caller (a tag stored beside the backup); it is never inferred from the
 * fields present.
 */
export function readLegacyBackup(version: unknown, raw: unknown): LegacyBackup {
  switch (version) {
    case 2:
      return { version: 2, backup: readCompatBackupV2(raw) };
    case 4:
      return { version: 4, backup: readCompatBackupV4(raw) };
    default:
      throw new UnsupportedVersionError(version);
  }
}
