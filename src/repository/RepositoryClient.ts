import { cfg } from "../config.js";
import { logger } from "../logger.js";
import { resolveDependencies, resolveToken, type ClientDependencies } from "./options.js";
import { RepositoryWorkspace } from "./RepositoryWorkspace.js";
import { modelRepoUrl } from "./urls.js";

export type RepositoryClientOptions = ClientDependencies & {
  modelDir: string;
  /** Model id on the hub, e.g. `org/model`. */
  modelId: string;
  /** Branch, tag or commit to clone. */
  revision?: string;
  /** Falls back to the saved login token when omitted. */
  token?: string | null;
};

/**
 * Local clone of a model repository. `open` clones on first use and reuses a
 * directory that already tracks the same remote.
 */
export class RepositoryClient {
  private constructor(
    private workspace: RepositoryWorkspace,
    readonly remoteUrl: string,
    readonly cloned: boolean,
  ) {}

  static async open(options: RepositoryClientOptions): Promise<RepositoryClient> {
    const { runner, credentials, endpoint } = resolveDependencies(options);
    const token = await resolveToken(options.token, credentials);
    const revision = options.revision ?? cfg.hub.defaultModelRevision;

    if (!(await runner.isLargeFileToolInstalled())) {
      logger.warn("git lfs is not installed, please install.");
    }

    const workspace = new RepositoryWorkspace(options.modelDir, runner, token);
    await workspace.ensureDirectory();
    const url = modelRepoUrl(endpoint.getEndpoint(), options.modelId);

    let cloned = false;
    if (await workspace.isClonedFrom(url)) {
      logger.info("model repository already cloned", { modelDir: options.modelDir, remote: url });
    } else {
      await workspace.clone(url, revision);
      cloned = true;
      if (await runner.isLargeFileToolInstalled()) {
        await runner.installLargeFileTool(options.modelDir);
      }
    }

    await workspace.configure();
    return new RepositoryClient(workspace, url, cloned);
  }

  get modelDir() {
    return this.workspace.workDir;
  }

  get hasToken() {
    return Boolean(this.workspace.token);
  }

  /** Pulls, stages everything, commits and pushes `branch` to the same-named remote branch. */
  async push(message: string, branch: string = cfg.hub.defaultModelRevision, force = false) {
    await this.workspace.push(message, branch, force);
  }
}
