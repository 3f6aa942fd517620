export { cfg } from "./config.js";
export { logger } from "./logger.js";
export { GitError, InvalidParameterError, NotLoginError } from "./errors.js";

export { RepositoryClient } from "./repository/RepositoryClient.js";
export type { RepositoryClientOptions } from "./repository/RepositoryClient.js";
export { DatasetRepositoryClient } from "./repository/DatasetRepositoryClient.js";
export type { DatasetRepositoryClientOptions } from "./repository/DatasetRepositoryClient.js";
export type { ClientDependencies } from "./repository/options.js";
export { modelRepoUrl, datasetRepoUrl } from "./repository/urls.js";
export { PushArgsSchema, parsePushArgs } from "./repository/validation.js";
export type { PushArgs } from "./repository/validation.js";

export { GitCli } from "./git/GitCommandRunner.js";
export type { GitCommandRunner, AddOptions } from "./git/GitCommandRunner.js";
export { runGit } from "./git/core.js";
export { addTokenToUrl, removeTokenFromUrl, hasToken } from "./git/utils/remoteUtils.js";

export { FileCredentialStore, parseUserInfo } from "./hub/credentials.js";
export type { CredentialStore, UserInfo } from "./hub/credentials.js";
export { createEndpointResolver } from "./hub/endpoint.js";
export type { EndpointResolver } from "./hub/endpoint.js";
