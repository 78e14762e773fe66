import type { BaseVirtualFolder, User } from "@compat-bridge/shared";

export interface UserStore {
  /** Stores the users and folders of one restore together, or nothing. */
  saveBackup(users: User[], folders: BaseVirtualFolder[]): Promise<void>;
  getUser(username: string): Promise<User | undefined>;
  listUsernames(): Promise<string[]>;
}
