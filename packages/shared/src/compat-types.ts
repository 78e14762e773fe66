// Shapes of accounts as older releases wrote them into backups.
// Keys are the JSON keys found in those files and must not be renamed.

export interface CompatUserV2 {
  readonly id: number;
  readonly username: string;
  readonly password?: string;
  readonly public_keys?: readonly string[];
  readonly home_dir: string;
  readonly uid: number;
  readonly gid: number;
  readonly max_sessions: number;
  readonly quota_size: number;
  readonly quota_files: number;
  readonly permissions: readonly string[];
  readonly used_quota_size: number;
  readonly used_quota_files: number;
  readonly last_quota_update: number;
  readonly upload_bandwidth: number;
  readonly download_bandwidth: number;
  readonly expiration_date: number;
  readonly last_login: number;
  readonly status: number;
}

export interface CompatS3FsConfigV4 {
  readonly bucket?: string;
  readonly key_prefix?: string;
  readonly region?: string;
  readonly access_key?: string;
  readonly access_secret?: string;     // "$aes$..." encoded
  readonly endpoint?: string;
  readonly storage_class?: string;
  readonly upload_part_size?: number;
  readonly upload_concurrency?: number;
}

export interface CompatGCSFsConfigV4 {
  readonly bucket?: string;
  readonly key_prefix?: string;
  // Never serialized; only set in memory.
  readonly credential_file?: string;
  readonly credentials?: string;       // base64 of the raw credential bytes
  readonly automatic_credentials?: number;
  readonly storage_class?: string;
}

export interface CompatAzBlobFsConfigV4 {
  readonly container?: string;
  readonly account_name?: string;
  readonly account_key?: string;       // "$aes$..." encoded
  readonly endpoint?: string;
  readonly sas_url?: string;
  readonly key_prefix?: string;
  readonly upload_part_size?: number;
  readonly upload_concurrency?: number;
  readonly use_emulator?: boolean;
  readonly access_tier?: string;
}

export interface CompatFilesystemV4 {
  readonly provider: number;
  readonly s3config: CompatS3FsConfigV4;
  readonly gcsconfig: CompatGCSFsConfigV4;
  readonly azblobconfig: CompatAzBlobFsConfigV4;
}

export interface CompatBaseVirtualFolderV4 {
  readonly id: number;
  readonly mapped_path: string;
  readonly used_quota_size: number;
  readonly used_quota_files: number;
  readonly last_quota_update: number;
  readonly users?: readonly string[];
}

export interface CompatVirtualFolderV4 extends CompatBaseVirtualFolderV4 {
  readonly virtual_path: string;
  readonly quota_size: number;
  readonly quota_files: number;
}

export interface CompatExtensionsFilterV4 {
  readonly path: string;
  readonly allowed_extensions?: readonly string[];
  readonly denied_extensions?: readonly string[];
}

export interface CompatPatternsFilterV4 {
  readonly path: string;
  readonly allowed_patterns?: readonly string[];
  readonly denied_patterns?: readonly string[];
}

export interface CompatUserFiltersV4 {
  readonly allowed_ip?: readonly string[];
  readonly denied_ip?: readonly string[];
  readonly denied_login_methods?: readonly string[];
  readonly denied_protocols?: readonly string[];
  readonly file_extensions?: readonly CompatExtensionsFilterV4[];
  readonly file_patterns?: readonly CompatPatternsFilterV4[];
  readonly max_upload_file_size?: number;
}

export interface CompatUserV4 {
  readonly id: number;
  readonly status: number;
  readonly username: string;
  readonly expiration_date: number;
  readonly password?: string;
  readonly public_keys?: readonly string[];
  readonly home_dir: string;
  readonly virtual_folders?: readonly CompatVirtualFolderV4[];
  readonly uid: number;
  readonly gid: number;
  readonly max_sessions: number;
  readonly quota_size: number;
  readonly quota_files: number;
  readonly permissions: Readonly<Record<string, readonly string[]>>;
  readonly used_quota_size: number;
  readonly used_quota_files: number;
  readonly last_quota_update: number;
  readonly upload_bandwidth: number;
  readonly download_bandwidth: number;
  readonly last_login: number;
  readonly filters: CompatUserFiltersV4;
  readonly filesystem: CompatFilesystemV4;
}

export interface CompatBackupV2 {
  readonly users: readonly CompatUserV2[];
}

export interface CompatBackupV4 {
  readonly users: readonly CompatUserV4[];
  readonly folders: readonly CompatBaseVirtualFolderV4[];
}

export type LegacyVersion = 2 | 4;

export type LegacyUserRecord =
  | { readonly version: 2; readonly user: CompatUserV2 }
  | { readonly version: 4; readonly user: CompatUserV4 };

export type LegacyBackup =
  | { readonly version: 2; readonly backup: CompatBackupV2 }
  | { readonly version: 4; readonly backup: CompatBackupV4 };
