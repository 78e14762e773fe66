export class CompatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A legacy secret field could not be turned into a current secret: the
 * credential file was unreadable or the encoded string did not decode.
 * The underlying failure is kept as `cause`.
 */
export class SecretResolutionError extends CompatError {
  readonly username: string;
  readonly field: string;
  readonly path?: string;

  constructor(
    message: string,
    details: { username: string; field: string; path?: string; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.username = details.username;
    this.field = details.field;
    this.path = details.path;
  }
}

// Malformed "$aes$..." value
export class DecodeError extends CompatError {}

export class SecretSealError extends CompatError {}

export class UnsupportedVersionError extends CompatError {
  readonly version: unknown;

  constructor(version: unknown) {
    super(`Unsupported legacy format version: ${String(version)}`);
    this.version = version;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
