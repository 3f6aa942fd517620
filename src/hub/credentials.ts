import fs from "fs/promises";
import path from "path";
import { cfg } from "../config.js";
import { logger } from "../logger.js";

export type UserInfo = {
  name: string;
  email: string;
};

export interface CredentialStore {
  getSavedToken(): Promise<string | null>;
  getUserInfo(): Promise<UserInfo | null>;
}

const TOKEN_FILE = "git_token";
const USER_FILE = "user";

function isNotFound(error: unknown) {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

export function parseUserInfo(raw: string | null): UserInfo | null {
  if (!raw) return null;
  const line = raw.trim();
  const sep = line.indexOf(":");
  if (sep <= 0) return null;
  const name = line.slice(0, sep).trim();
  const email = line.slice(sep + 1).trim();
  if (!name || !email) return null;
  return { name, email };
}

/**
 * Token and user identity saved after a hub login, one small file each under
 * the credentials directory.
 */
export class FileCredentialStore implements CredentialStore {
  constructor(readonly dir: string = cfg.hub.credentialsPath) {}

  async getSavedToken(): Promise<string | null> {
    const raw = await readOptional(path.join(this.dir, TOKEN_FILE));
    const token = (raw || "").trim();
    return token.length ? token : null;
  }

  async getUserInfo(): Promise<UserInfo | null> {
    const raw = await readOptional(path.join(this.dir, USER_FILE));
    const info = parseUserInfo(raw);
    if (raw !== null && !info) {
      logger.warn("ignoring malformed saved user info", { file: path.join(this.dir, USER_FILE) });
    }
    return info;
  }

  async saveToken(token: string) {
    const trimmed = token.trim();
    if (!trimmed) throw new Error("token must not be empty");
    await this.writeFile(TOKEN_FILE, trimmed);
  }

  async saveUserInfo(info: UserInfo) {
    if (!parseUserInfo(`${info.name}:${info.email}`)) {
      throw new Error("user info requires both name and email");
    }
    await this.writeFile(USER_FILE, `${info.name.trim()}:${info.email.trim()}`);
  }

  async clear() {
    await fs.rm(path.join(this.dir, TOKEN_FILE), { force: true });
    await fs.rm(path.join(this.dir, USER_FILE), { force: true });
  }

  private async writeFile(name: string, content: string) {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(path.join(this.dir, name), content, { mode: 0o600 });
  }
}
