import { describe, it, expect, vi } from "vitest";
import { DecodeError, SecretResolutionError } from "./errors";
import { plainSecret } from "./secret";
import { resolveLegacySecret, type SecretMigratorDeps } from "./secret-migrator";

const context = { username: "alice", field: "gcsconfig.credentials" };

function makeDeps(overrides: Partial<SecretMigratorDeps> = {}): SecretMigratorDeps {
  return {
    readCredentialFile: vi.fn(() => "from-file"),
    decodeCompatSecret: vi.fn(() => plainSecret("from-decoder")),
    ...overrides,
  };
}

describe("resolveLegacySecret", () => {
  it("returns inline bytes unchanged as a plain secret", () => {
    const deps = makeDeps();
    const secret = resolveLegacySecret(
      { plaintext: Buffer.from('{"type":"service_account"}', "utf8") },
      context,
      deps
    );
    expect(secret).toEqual({ status: "plain", payload: '{"type":"service_account"}' });
  });

  it("rejects inline bytes that are not UTF-8", () => {
    const deps = makeDeps();

    let caught: unknown;
    try {
      resolveLegacySecret({ plaintext: new Uint8Array([0xff, 0xfe, 0x41]) }, context, deps);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SecretResolutionError);
    if (!(caught instanceof SecretResolutionError)) return;
    expect(caught.message).toBe(
      'Unable to decode gcsconfig.credentials of user "alice": Secret bytes are not valid UTF-8'
    );
    expect(caught.cause).toBeInstanceOf(DecodeError);
    expect(deps.readCredentialFile).not.toHaveBeenCalled();
  });

  it("keeps a leading byte order mark", () => {
    const secret = resolveLegacySecret(
      { plaintext: new Uint8Array([0xef, 0xbb, 0xbf, 0x41]) },
      context,
      makeDeps()
    );
    expect(secret).toEqual({ status: "plain", payload: "\ufeffA" });
  });

  it("prefers inline plaintext over the file and the encoded string", () => {
    const deps = makeDeps();
    const secret = resolveLegacySecret(
      { plaintext: "inline", credentialFile: "/creds/a.json", encoded: "$aes$x$y" },
      context,
      deps
    );
    expect(secret.payload).toBe("inline");
    expect(deps.readCredentialFile).not.toHaveBeenCalled();
    expect(deps.decodeCompatSecret).not.toHaveBeenCalled();
  });

  it("treats empty plaintext as absent and falls through to the file", () => {
    const deps = makeDeps();
    const secret = resolveLegacySecret(
      { plaintext: new Uint8Array(0), credentialFile: "/creds/a.json" },
      context,
      deps
    );
    expect(deps.readCredentialFile).toHaveBeenCalledWith("/creds/a.json");
    expect(secret).toEqual({ status: "plain", payload: "from-file" });
  });

  it("prefers the credential file over the encoded string", () => {
    const deps = makeDeps();
    resolveLegacySecret({ credentialFile: "/creds/a.json", encoded: "$aes$x$y" }, context, deps);
    expect(deps.decodeCompatSecret).not.toHaveBeenCalled();
  });

  it("reports the path and the I/O error when the file cannot be read", () => {
    const ioError = Object.assign(new Error("ENOENT: no such file or directory"), { code: "ENOENT" });
    const deps = makeDeps({
      readCredentialFile: () => {
        throw ioError;
      },
    });

    let caught: unknown;
    try {
      resolveLegacySecret({ credentialFile: "/creds/missing.json" }, context, deps);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SecretResolutionError);
    if (!(caught instanceof SecretResolutionError)) return;
    expect(caught.path).toBe("/creds/missing.json");
    expect(caught.username).toBe("alice");
    expect(caught.field).toBe("gcsconfig.credentials");
    expect(caught.cause).toBe(ioError);
  });

  it("rejects a credential file that is not UTF-8 and names its path", () => {
    const deps = makeDeps({ readCredentialFile: () => new Uint8Array([0x7b, 0xc3, 0x28, 0x7d]) });

    let caught: unknown;
    try {
      resolveLegacySecret({ credentialFile: "/creds/a.json" }, context, deps);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SecretResolutionError);
    if (!(caught instanceof SecretResolutionError)) return;
    expect(caught.message).toBe(
      'Unable to decode credential file "/creds/a.json" for gcsconfig.credentials of user "alice": Secret bytes are not valid UTF-8'
    );
    expect(caught.path).toBe("/creds/a.json");
    expect(caught.cause).toBeInstanceOf(DecodeError);
  });

  it("delegates encoded strings to the decoder", () => {
    const deps = makeDeps();
    const secret = resolveLegacySecret({ encoded: "$aes$key$data" }, context, deps);
    expect(deps.decodeCompatSecret).toHaveBeenCalledWith("$aes$key$data");
    expect(secret).toEqual({ status: "plain", payload: "from-decoder" });
  });

  it("wraps decoder errors with the username and field", () => {
    const decodeError = new DecodeError("Encoded secret is not in the expected format");
    const deps = makeDeps({
      decodeCompatSecret: () => {
        throw decodeError;
      },
    });

    let caught: unknown;
    try {
      resolveLegacySecret({ encoded: "garbage" }, { username: "bob", field: "s3config.access_secret" }, deps);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SecretResolutionError);
    if (!(caught instanceof SecretResolutionError)) return;
    expect(caught.message).toBe(
      'Unable to decode s3config.access_secret of user "bob": Encoded secret is not in the expected format'
    );
    expect(caught.username).toBe("bob");
    expect(caught.field).toBe("s3config.access_secret");
    expect(caught.path).toBeUndefined();
    expect(caught.cause).toBe(decodeError);
  });

  it("returns an unset secret when nothing is populated", () => {
    const deps = makeDeps();
    expect(resolveLegacySecret({}, context, deps)).toEqual({ status: "none", payload: "" });
    expect(resolveLegacySecret({ plaintext: "", credentialFile: "", encoded: "" }, context, deps)).toEqual({
      status: "none",
      payload: "",
    });
    expect(deps.readCredentialFile).not.toHaveBeenCalled();
    expect(deps.decodeCompatSecret).not.toHaveBeenCalled();
  });
});
