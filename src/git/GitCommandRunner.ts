import path from "path";
import { cfg } from "../config.js";
import { logger } from "../logger.js";
import type { CredentialStore } from "../hub/credentials.js";
import { runGit } from "./core.js";
import { addTokenToUrl, hasToken, removeTokenFromUrl } from "./utils/remoteUtils.js";

export type AddOptions = {
  allFiles?: boolean;
  files?: string[];
};

/**
 * The git operations the repository clients need. `GitCli` runs them through
 * the git executable; tests substitute a recording fake.
 */
export interface GitCommandRunner {
  clone(baseDir: string, token: string | null, url: string, repoName: string, revision?: string | null): Promise<void>;
  pull(dir: string): Promise<void>;
  add(dir: string, options: AddOptions): Promise<void>;
  commit(dir: string, message: string): Promise<void>;
  push(
    dir: string,
    token: string | null,
    url: string,
    localBranch: string,
    remoteBranch: string,
    force?: boolean,
  ): Promise<void>;
  /** Rejects with `GitError` when `dir` is not a repository or has no origin. */
  getRemoteUrl(dir: string): Promise<string>;
  removeTokenFromUrl(url: string | null): string;
  isLargeFileToolInstalled(): Promise<boolean>;
  installLargeFileTool(dir: string): Promise<void>;
  configureAuthToken(dir: string, token: string): Promise<void>;
  configureUserInfo(baseDir: string, repoName: string): Promise<void>;
}

export class GitCli implements GitCommandRunner {
  constructor(
    private credentials: CredentialStore,
    private gitPath: string = cfg.git.path,
  ) {}

  private run(args: string[], cwd?: string) {
    return runGit(args, { cwd, gitPath: this.gitPath });
  }

  async clone(baseDir: string, token: string | null, url: string, repoName: string, revision?: string | null) {
    const args = ["clone", addTokenToUrl(url, token), repoName];
    if (revision) args.push("--branch", revision);
    logger.info("git clone", { remote: removeTokenFromUrl(url), baseDir, repoName, revision });
    await this.run(args, baseDir);
  }

  async pull(dir: string) {
    await this.run(["pull"], dir);
  }

  async add(dir: string, options: AddOptions) {
    if (options.allFiles) {
      await this.run(["add", "-A"], dir);
      return;
    }
    if (options.files && options.files.length > 0) {
      await this.run(["add", "--", ...options.files], dir);
    }
  }

  async commit(dir: string, message: string) {
    await this.run(["commit", "-m", message], dir);
  }

  async push(
    dir: string,
    token: string | null,
    url: string,
    localBranch: string,
    remoteBranch: string,
    force = false,
  ) {
    const args = ["push", addTokenToUrl(url, token), `${localBranch}:${remoteBranch}`];
    if (force) args.push("--force");
    logger.info("git push", { repoDir: dir, remote: removeTokenFromUrl(url), localBranch, remoteBranch, force });
    await this.run(args, dir);
  }

  async getRemoteUrl(dir: string) {
    const result = await this.run(["config", "--get", "remote.origin.url"], dir);
    return result.stdout.trim();
  }

  removeTokenFromUrl(url: string | null) {
    return removeTokenFromUrl(url);
  }

  async isLargeFileToolInstalled() {
    try {
      await this.run(["lfs", "env"]);
      return true;
    } catch (e) {
      logger.debug("git lfs not available", { error: String(e) });
      return false;
    }
  }

  async installLargeFileTool(dir: string) {
    await this.run(["lfs", "install"], dir);
  }

  async configureAuthToken(dir: string, token: string) {
    const remote = await this.getRemoteUrl(dir);
    const withToken = addTokenToUrl(remote, token);
    if (withToken === remote || (hasToken(remote) && remote.includes(token))) return;
    await this.run(["remote", "set-url", "origin", withToken], dir);
  }

  async configureUserInfo(baseDir: string, repoName: string) {
    const info = await this.credentials.getUserInfo();
    if (!info) {
      logger.debug("no saved user info, leaving git identity unchanged", { repoName });
      return;
    }
    const repoDir = path.join(baseDir, repoName);
    await this.run(["config", "user.name", info.name], repoDir);
    await this.run(["config", "user.email", info.email], repoDir);
  }
}
