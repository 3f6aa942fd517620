import { cfg } from "../config.js";
import { logger } from "../logger.js";
import { resolveDependencies, resolveToken, type ClientDependencies } from "./options.js";
import { RepositoryWorkspace } from "./RepositoryWorkspace.js";
import { datasetRepoUrl } from "./urls.js";

export type DatasetRepositoryClientOptions = ClientDependencies & {
  workDir: string;
  datasetId: string;
  revision?: string;
  token?: string | null;
};

/**
 * Working copy of a dataset (metadata) repository. Unlike the model client,
 * cloning is an explicit step.
 */
export class DatasetRepositoryClient {
  private constructor(
    private workspace: RepositoryWorkspace,
    readonly datasetId: string,
    readonly revision: string,
    readonly repoUrl: string,
  ) {}

  static async create(options: DatasetRepositoryClientOptions): Promise<DatasetRepositoryClient> {
    const { runner, credentials, endpoint } = resolveDependencies(options);
    const token = await resolveToken(options.token, credentials);
    const workspace = new RepositoryWorkspace(options.workDir, runner, token);
    await workspace.ensureDirectory();
    return new DatasetRepositoryClient(
      workspace,
      options.datasetId,
      options.revision ?? cfg.hub.defaultDatasetRevision,
      datasetRepoUrl(endpoint.getEndpoint(), options.datasetId),
    );
  }

  get workDir() {
    return this.workspace.workDir;
  }

  get hasToken() {
    return Boolean(this.workspace.token);
  }

  /** Returns the working directory after a fresh clone, or "" when it already tracks the dataset. */
  async clone(): Promise<string> {
    if (await this.workspace.isClonedFrom(this.repoUrl)) {
      return "";
    }
    logger.info(`Cloning repo from ${this.repoUrl}`);
    await this.workspace.clone(this.repoUrl, this.revision);
    return this.workspace.workDir;
  }

  async push(message: string, branch: string = cfg.hub.defaultDatasetRevision, force = false) {
    await this.workspace.push(message, branch, force);
  }
}
