import { GitCli, type GitCommandRunner } from "../git/GitCommandRunner.js";
import { FileCredentialStore, type CredentialStore } from "../hub/credentials.js";
import { createEndpointResolver, type EndpointResolver } from "../hub/endpoint.js";

export type ClientDependencies = {
  /** Path to the git executable; ignored when `runner` is given. */
  gitPath?: string;
  runner?: GitCommandRunner;
  credentials?: CredentialStore;
  endpoint?: EndpointResolver;
};

export type ResolvedDependencies = {
  runner: GitCommandRunner;
  credentials: CredentialStore;
  endpoint: EndpointResolver;
};

export function resolveDependencies(deps: ClientDependencies): ResolvedDependencies {
  const credentials = deps.credentials ?? new FileCredentialStore();
  return {
    credentials,
    runner: deps.runner ?? new GitCli(credentials, deps.gitPath),
    endpoint: deps.endpoint ?? createEndpointResolver(),
  };
}

export async function resolveToken(
  token: string | null | undefined,
  credentials: CredentialStore,
): Promise<string | null> {
  if (token) return token;
  return credentials.getSavedToken();
}
