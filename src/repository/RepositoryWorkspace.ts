import { GitError, NotLoginError } from "../errors.js";
import type { GitCommandRunner } from "../git/GitCommandRunner.js";
import { ensureDirectory, isDirectoryEmpty, splitRepoPath } from "../git/utils/fsUtils.js";
import { logger } from "../logger.js";
import { parsePushArgs } from "./validation.js";

/**
 * Local working directory of one hub repository. Both repository clients
 * delegate to it; they differ only in how the remote URL is built and in
 * their default revision.
 */
export class RepositoryWorkspace {
  readonly baseDir: string;
  readonly repoName: string;

  constructor(
    readonly workDir: string,
    private runner: GitCommandRunner,
    readonly token: string | null,
  ) {
    const { baseDir, repoName } = splitRepoPath(workDir);
    this.baseDir = baseDir;
    this.repoName = repoName;
  }

  async ensureDirectory() {
    await ensureDirectory(this.workDir);
  }

  async readRemoteUrl(): Promise<string | null> {
    try {
      return await this.runner.getRemoteUrl(this.workDir);
    } catch (error) {
      if (!(error instanceof GitError)) throw error;
      logger.debug("no readable remote in working directory", { workDir: this.workDir, error: error.message });
      return null;
    }
  }

  /** Only the remote URL is compared; the checked-out revision is not inspected. */
  async isClonedFrom(targetUrl: string): Promise<boolean> {
    if (await isDirectoryEmpty(this.workDir)) return false;
    const remote = this.runner.removeTokenFromUrl(await this.readRemoteUrl());
    return remote.length > 0 && remote === targetUrl;
  }

  async clone(url: string, revision: string | null) {
    await this.runner.clone(this.baseDir, this.token, url, this.repoName, revision);
  }

  async configure() {
    await this.runner.configureUserInfo(this.baseDir, this.repoName);
    if (this.token) {
      await this.runner.configureAuthToken(this.workDir, this.token);
    }
  }

  async push(message: unknown, branch: unknown, force: unknown) {
    const args = parsePushArgs({ message, branch, force });
    if (!this.token) {
      throw new NotLoginError();
    }

    await this.runner.configureAuthToken(this.workDir, this.token);
    await this.runner.configureUserInfo(this.baseDir, this.repoName);

    const url = await this.runner.getRemoteUrl(this.workDir);
    await this.runner.pull(this.workDir);
    await this.runner.add(this.workDir, { allFiles: true });
    await this.runner.commit(this.workDir, args.message);
    await this.runner.push(this.workDir, this.token, url, args.branch, args.branch, args.force);
    logger.info("pushed working directory", {
      workDir: this.workDir,
      remote: this.runner.removeTokenFromUrl(url),
      branch: args.branch,
    });
  }
}
