import sqlite3 from "sqlite3";
import path from "path";
import fs from "fs";
import type { BaseVirtualFolder, User } from "@compat-bridge/shared";
import type { UserStore } from "./store";

export class Database {
  private constructor(private readonly db: sqlite3.Database) {}

  static async open(dbPath: string): Promise<Database> {
    if (dbPath !== ":memory:") {
      const dataDir = path.dirname(dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true, mode: 0o700 });
      }
    }

    const handle = await new Promise<sqlite3.Database>((resolve, reject) => {
      const db = new sqlite3.Database(dbPath, (err) => {
        if (err) return reject(err);
        resolve(db);
      });
    });

    const database = new Database(handle);
    await database.init();
    return database;
  }

  private async init(): Promise<void> {
    await this.run("PRAGMA journal_mode = WAL");
    await this.run("PRAGMA synchronous = NORMAL");
    await this.run("PRAGMA foreign_keys = ON");
    await this.run("PRAGMA temp_store = MEMORY");

    await this.run(`
      CREATE TABLE IF NOT EXISTS users (
        username TEXT PRIMARY KEY,
        id INTEGER NOT NULL,
        data TEXT NOT NULL,
        restored_at INTEGER NOT NULL
      )
    `);

    await this.run(`
      CREATE TABLE IF NOT EXISTS folders (
        mapped_path TEXT PRIMARY KEY,
        data TEXT NOT NULL,
        restored_at INTEGER NOT NULL
      )
    `);
  }

  public run(sql: string, params: unknown[] = []): Promise<{ lastID: number; changes: number }> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (err) {
        if (err) return reject(err);
        resolve({ lastID: this.lastID, changes: this.changes });
      });
    });
  }

  public get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err: Error | null, row: T) => {
        if (err) return reject(err);
        resolve(row);
      });
    });
  }

  public all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) return reject(err);
        resolve(rows);
      });
    });
  }

  public async transaction(work: () => Promise<void>): Promise<void> {
    await this.run("BEGIN IMMEDIATE");
    try {
      await work();
      await this.run("COMMIT");
    } catch (error) {
      await this.run("ROLLBACK");
      throw error;
    }
  }

  public close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) return reject(err);
        resolve();
      });
    });
  }
}

/**
 * Restored accounts, one JSON document per username. Restoring an account
 * again replaces the stored document.
 */
export class SqliteUserStore implements UserStore {
  constructor(private readonly db: Database) {}

  async saveBackup(users: User[], folders: BaseVirtualFolder[]): Promise<void> {
    const now = Date.now();
    await this.db.transaction(async () => {
      for (const user of users) {
        await this.db.run(
          `INSERT INTO users (username, id, data, restored_at) VALUES (?, ?, ?, ?)
           ON CONFLICT(username) DO UPDATE SET id = excluded.id, data = excluded.data, restored_at = excluded.restored_at`,
          [user.username, user.id, JSON.stringify(user), now]
        );
      }
      for (const folder of folders) {
        await this.db.run(
          `INSERT INTO folders (mapped_path, data, restored_at) VALUES (?, ?, ?)
           ON CONFLICT(mapped_path) DO UPDATE SET data = excluded.data, restored_at = excluded.restored_at`,
          [folder.mappedPath, JSON.stringify(folder), now]
        );
      }
    });
  }

  async getUser(username: string): Promise<User | undefined> {
    const row = await this.db.get<{ data: string }>("SELECT data FROM users WHERE username = ?", [username]);
    if (!row) {
      return undefined;
    }
    const user: User = JSON.parse(row.data);
    return user;
  }

  async listUsernames(): Promise<string[]> {
    const rows = await this.db.all<{ username: string }>("SELECT username FROM users ORDER BY username");
    return rows.map((row) => row.username);
  }
}
