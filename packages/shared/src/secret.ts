// "none" means not set; "aes-256-gcm" is a secret sealed at rest.
export type SecretStatus = "none" | "plain" | "aes-256-gcm" | "redacted";

export interface Secret {
  status: SecretStatus;
  payload: string;
  additionalData?: string;
}

export function emptySecret(): Secret {
  return { status: "none", payload: "" };
}

export function plainSecret(payload: string): Secret {
  return { status: "plain", payload };
}

export function isSecretEmpty(secret: Secret): boolean {
  return secret.status === "none" && secret.payload === "";
}

/**
 * Strip the payload for display. Unset secrets stay unset so callers can
 * still tell "no credential" from "hidden credential".
 */
export function redactSecret(secret: Secret): Secret {
  if (isSecretEmpty(secret)) {
    return emptySecret();
  }
  return { status: "redacted", payload: "" };
}
