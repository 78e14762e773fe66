import crypto from "crypto";

export const ADMIN_SECRET_HEADER = "x-compat-admin-secret";

export function isAdminSecretValid(header: string | string[] | undefined, adminSecret: string): boolean {
  if (typeof header !== "string") {
    return false;
  }
  // Timing-safe comparison; lengths must match first
  const provided = Buffer.from(header);
  const expected = Buffer.from(adminSecret);
  return provided.length === expected.length && crypto.timingSafeEqual(provided, expected);
}
