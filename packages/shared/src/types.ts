import type { Secret } from "./secret";

export const FilesystemProvider = {
  Local: 0,
  S3: 1,
  GCS: 2,
  AzureBlob: 3,
} as const;

export type FilesystemProviderId = (typeof FilesystemProvider)[keyof typeof FilesystemProvider];

export interface S3FsConfig {
  bucket: string;
  keyPrefix: string;
  region: string;
  accessKey: string;
  accessSecret: Secret;
  endpoint: string;
  storageClass: string;
  uploadPartSize: number;              // MB, 0 = driver default
  uploadConcurrency: number;
}

export interface GCSFsConfig {
  bucket: string;
  keyPrefix: string;
  credentials: Secret;                 // service account JSON
  automaticCredentials: number;        // 1 = use the environment's default credentials
  storageClass: string;
}

export interface AzBlobFsConfig {
  container: string;
  accountName: string;
  accountKey: Secret;
  endpoint: string;
  sasUrl: string;
  keyPrefix: string;
  uploadPartSize: number;
  uploadConcurrency: number;
  useEmulator: boolean;
  accessTier: string;
}

// Only the block of the active provider exists.
export type Filesystem =
  | { provider: typeof FilesystemProvider.Local; originalProvider?: number } // set when the legacy value was unknown
  | { provider: typeof FilesystemProvider.S3; s3config: S3FsConfig }
  | { provider: typeof FilesystemProvider.GCS; gcsconfig: GCSFsConfig }
  | { provider: typeof FilesystemProvider.AzureBlob; azblobconfig: AzBlobFsConfig };

export interface BaseVirtualFolder {
  id: number;
  mappedPath: string;
  usedQuotaSize: number;
  usedQuotaFiles: number;
  lastQuotaUpdate: number;
  users: string[];
}

export interface VirtualFolder extends BaseVirtualFolder {
  virtualPath: string;
  quotaSize: number;                   // -1 = included in the user quota
  quotaFiles: number;
}

export interface FileExtensionsFilter {
  path: string;
  allowedExtensions: string[];
  deniedExtensions: string[];
}

export interface PatternsFilter {
  path: string;
  allowedPatterns: string[];
  deniedPatterns: string[];
}

export interface UserFilters {
  allowedIP: string[];
  deniedIP: string[];
  deniedLoginMethods: string[];
  deniedProtocols: string[];
  fileExtensions: FileExtensionsFilter[];
  filePatterns: PatternsFilter[];
  maxUploadFileSize: number;
}

export interface User {
  id: number;
  status: number;                      // 1 enabled, 0 disabled
  username: string;
  expirationDate: number;              // Unix timestamp (ms), 0 = never
  password: string;                    // hashed
  publicKeys: string[];
  homeDir: string;
  virtualFolders: VirtualFolder[];
  uid: number;
  gid: number;
  maxSessions: number;
  quotaSize: number;
  quotaFiles: number;
  permissions: Record<string, string[]>;  // virtual path -> permissions
  usedQuotaSize: number;
  usedQuotaFiles: number;
  lastQuotaUpdate: number;
  uploadBandwidth: number;             // KB/s
  downloadBandwidth: number;
  lastLogin: number;
  filters: UserFilters;
  fsConfig: Filesystem;
}

export function emptyUserFilters(): UserFilters {
  return {
    allowedIP: [],
    deniedIP: [],
    deniedLoginMethods: [],
    deniedProtocols: [],
    fileExtensions: [],
    filePatterns: [],
    maxUploadFileSize: 0,
  };
}
