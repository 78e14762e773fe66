import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { tmpdir } from "os";
import { join } from "path";
import type { FastifyInstance } from "fastify";
import type https from "https";
import {
  FilesystemProvider,
  deriveSealingKey,
  encodeCompatSecret,
  openSecret,
  type BaseVirtualFolder,
  type User,
} from "@compat-bridge/shared";
import { buildApp } from "./app";
import { ADMIN_SECRET_HEADER } from "./middleware/auth";
import type { UserStore } from "./storage/store";

class MemoryUserStore implements UserStore {
  readonly users = new Map<string, User>();
  readonly folders = new Map<string, BaseVirtualFolder>();

  failFolderWrites = false;

  async saveBackup(users: User[], folders: BaseVirtualFolder[]): Promise<void> {
    if (this.failFolderWrites && folders.length > 0) {
      throw new Error("folder write failed");
    }
    for (const user of users) this.users.set(user.username, structuredClone(user));
    for (const folder of folders) this.folders.set(folder.mappedPath, structuredClone(folder));
  }

  async getUser(username: string): Promise<User | undefined> {
    const user = this.users.get(username);
    return user ? structuredClone(user) : undefined;
  }

  async listUsernames(): Promise<string[]> {
    return [...this.users.keys()].sort();
  }
}

const credentialsDir = join(tmpdir(), "compat-bridge-no-such-credentials");
const config = {
  CREDENTIALS_DIR: credentialsDir,
  ADMIN_SECRET: "test-admin-secret",
  MASTER_KEY: "test-master-key",
};
const authHeaders = { [ADMIN_SECRET_HEADER]: "test-admin-secret" };

function s3User(username: string, accessSecret: string): Record<string, unknown> {
  return {
    id: 1,
    status: 1,
    username,
    home_dir: `/srv/${username}`,
    permissions: { "/": ["*"] },
    filesystem: {
      provider: 1,
      s3config: { bucket: "backups", access_key: "test-access-key", access_secret: accessSecret },
    },
  };
}

function gcsUser(username: string): Record<string, unknown> {
  return {
    id: 2,
    status: 1,
    username,
    home_dir: `/srv/${username}`,
    permissions: { "/": ["list"] },
    filesystem: { provider: 2, gcsconfig: { bucket: "gcs-bucket", automatic_credentials: 0 } },
  };
}

describe("restore service", () => {
  let store: MemoryUserStore;
  let app: FastifyInstance<https.Server>;

  beforeEach(() => {
    store = new MemoryUserStore();
    app = buildApp({ store, config, https: null, logger: false });
  });

  afterEach(async () => {
    await app.close();
  });

  it("answers health checks without authentication", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok", version: "1.0.0" });
  });

  it("rejects API calls without the admin secret", async () => {
    const missing = await app.inject({ method: "GET", url: "/api/users" });
    expect(missing.statusCode).toBe(401);
    expect(missing.json()).toEqual({ error: "Missing or invalid admin secret" });

    const wrong = await app.inject({
      method: "GET",
      url: "/api/users",
      headers: { [ADMIN_SECRET_HEADER]: "wrong-secret" },
    });
    expect(wrong.statusCode).toBe(401);
  });

  it("restores a v4 backup and seals the resolved secrets", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/restore",
      headers: authHeaders,
      payload: {
        version: 4,
        backup: {
          users: [s3User("alice", encodeCompatSecret("test-secret"))],
          folders: [{ id: 1, mapped_path: "/data/shared" }],
        },
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ restored: 1, folders: 1, failures: [] });

    const fsConfig = store.users.get("alice")?.fsConfig;
    if (fsConfig?.provider !== FilesystemProvider.S3) {
      throw new Error("expected alice to be restored with an S3 filesystem");
    }
    const secret = fsConfig.s3config.accessSecret;
    expect(secret.status).toBe("aes-256-gcm");
    expect(openSecret(secret, deriveSealingKey("test-master-key"))).toEqual({
      status: "plain",
      payload: "test-secret",
    });
    expect(store.folders.has("/data/shared")).toBe(true);
  });

  it("stores no account when the folders cannot be written", async () => {
    store.failFolderWrites = true;

    const res = await app.inject({
      method: "POST",
      url: "/api/restore",
      headers: authHeaders,
      payload: {
        version: 4,
        backup: {
          users: [s3User("alice", encodeCompatSecret("test-secret"))],
          folders: [{ id: 1, mapped_path: "/data/shared" }],
        },
      },
    });

    expect(res.statusCode).toBe(500);
    expect(store.users.size).toBe(0);
    expect(store.folders.size).toBe(0);
  });

  it("restores a v2 backup", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/restore",
      headers: authHeaders,
      payload: { version: 2, backup: { users: [{ id: 5, username: "carol", permissions: ["list"] }] } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ restored: 1, folders: 0, failures: [] });
    expect(store.users.get("carol")?.permissions).toEqual({ "/": ["list"] });
  });

  it("stores the accounts that converted and reports the others", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/restore",
      headers: authHeaders,
      payload: { version: 4, backup: { users: [gcsUser("bob"), s3User("alice", "")] } },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.restored).toBe(1);
    expect(body.failures).toEqual([
      {
        username: "bob",
        error: expect.stringContaining(join(credentialsDir, "bob_gcs_credentials.json")),
      },
    ]);
    expect(await store.listUsernames()).toEqual(["alice"]);
  });

  it("stores nothing in abort mode when an account fails", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/restore",
      headers: authHeaders,
      payload: {
        version: 4,
        mode: "abort",
        backup: { users: [s3User("alice", ""), s3User("dave", "$aes$broken$00")] },
      },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: "Restore aborted: some accounts could not be converted",
      failures: [
        {
          username: "dave",
          error: 'Unable to decode s3config.access_secret of user "dave": Encoded secret has an invalid key length',
        },
      ],
    });
    expect(store.users.size).toBe(0);
  });

  it("rejects unknown format versions and malformed bodies", async () => {
    const unknownVersion = await app.inject({
      method: "POST",
      url: "/api/restore",
      headers: authHeaders,
      payload: { version: 3, backup: {} },
    });
    expect(unknownVersion.statusCode).toBe(400);
    expect(unknownVersion.json()).toEqual({ error: "Unsupported legacy format version: 3" });

    const missingBackup = await app.inject({
      method: "POST",
      url: "/api/restore",
      headers: authHeaders,
      payload: { version: 4 },
    });
    expect(missingBackup.statusCode).toBe(400);
  });

  it("lists restored accounts and never returns secret payloads", async () => {
    await app.inject({
      method: "POST",
      url: "/api/restore",
      headers: authHeaders,
      payload: { version: 4, backup: { users: [s3User("alice", encodeCompatSecret("test-secret"))] } },
    });

    const list = await app.inject({ method: "GET", url: "/api/users", headers: authHeaders });
    expect(list.json()).toEqual({ usernames: ["alice"] });

    const res = await app.inject({ method: "GET", url: "/api/users/alice", headers: authHeaders });
    expect(res.statusCode).toBe(200);
    expect(res.json().fsConfig.s3config.accessSecret).toEqual({ status: "redacted", payload: "" });
    expect(res.body).not.toContain("test-secret");

    const missing = await app.inject({ method: "GET", url: "/api/users/nobody", headers: authHeaders });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: "User not found" });
  });
});
