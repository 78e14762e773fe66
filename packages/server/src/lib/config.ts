import crypto from "crypto";

const DEFAULT_PORT = 8743;

// Generate a cryptographically random secret if not provided
function generateSecret(): string {
  return crypto.randomBytes(32).toString("base64");
}

export interface ServerConfig {
  PORT: number;
  CERTS_DIR: string;
  DATA_DIR: string;
  CREDENTIALS_DIR: string;
  ADMIN_SECRET: string;
  MASTER_KEY: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number.parseInt(env.COMPAT_BRIDGE_PORT || "", 10);
  return {
    PORT: Number.isNaN(port) ? DEFAULT_PORT : port,
    CERTS_DIR: env.COMPAT_BRIDGE_CERTS || "./certs",
    DATA_DIR: env.COMPAT_BRIDGE_DATA || "./data",
    // Where old GCS setups kept <username>_gcs_credentials.json
    CREDENTIALS_DIR: env.COMPAT_BRIDGE_CREDENTIALS || "./credentials",
    // In production, always set both explicitly: a generated master key
    // makes every sealed secret unreadable after a restart.
    ADMIN_SECRET: env.COMPAT_BRIDGE_ADMIN_SECRET || generateSecret(),
    MASTER_KEY: env.COMPAT_BRIDGE_MASTER_KEY || generateSecret(),
  };
}

export const CONFIG = loadConfig();
