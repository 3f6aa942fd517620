#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { FileCredentialStore, type UserInfo } from "../hub/credentials.js";
import { logger } from "../logger.js";
import { DatasetRepositoryClient } from "../repository/DatasetRepositoryClient.js";
import type { ClientDependencies } from "../repository/options.js";
import { RepositoryClient } from "../repository/RepositoryClient.js";

type RepoTarget = { dir: string; id: string; revision?: string };

export type Command =
  | { kind: "login"; token: string; user?: UserInfo }
  | ({ kind: "clone-model" | "clone-dataset" } & RepoTarget)
  | ({
      kind: "push-model" | "push-dataset";
      message: string;
      branch?: string;
      force: boolean;
    } & RepoTarget);

export type ParseResult = { ok: true; command: Command } | { ok: false; error: string };

const VALUE_FLAGS: Record<string, string> = {
  "--revision": "revision",
  "--branch": "branch",
  "-m": "message",
  "--message": "message",
  "--name": "name",
  "--email": "email",
};

export function printUsage() {
  console.error("Usage: hub-repo <command> [args] [flags]");
  console.error("");
  console.error("Commands:");
  console.error("  login <token> [--name <name> --email <email>]");
  console.error("  clone-model <dir> <modelId> [--revision <rev>]");
  console.error("  clone-dataset <dir> <datasetId> [--revision <rev>]");
  console.error("  push-model <dir> <modelId> -m <message> [--branch <b>] [--force]");
  console.error("  push-dataset <dir> <datasetId> -m <message> [--branch <b>] [--force]");
  console.error("");
  console.error("Environment:");
  console.error("  HUB_ENDPOINT=<url>            (hub base URL)");
  console.error("  HUB_CREDENTIALS_PATH=<path>   (saved token and user info)");
  console.error("  GIT_PATH=<path>               (git executable)");
}

export function parseArgs(argv: string[]): ParseResult {
  const [kind, ...rest] = argv;
  if (!kind) return { ok: false, error: "missing command" };

  const positionals: string[] = [];
  const values: Record<string, string> = {};
  let force = false;
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--force") {
      force = true;
      continue;
    }
    const key = VALUE_FLAGS[arg];
    if (key) {
      const value = rest[i + 1];
      if (value === undefined) return { ok: false, error: `${arg} requires a value` };
      values[key] = value;
      i++;
      continue;
    }
    if (arg.startsWith("-")) return { ok: false, error: `unknown flag ${arg}` };
    positionals.push(arg);
  }

  switch (kind) {
    case "login": {
      const [token] = positionals;
      if (!token || positionals.length !== 1) return { ok: false, error: "login takes exactly one token" };
      const { name, email } = values;
      if (Boolean(name) !== Boolean(email)) {
        return { ok: false, error: "--name and --email must be given together" };
      }
      return { ok: true, command: name && email ? { kind, token, user: { name, email } } : { kind, token } };
    }
    case "clone-model":
    case "clone-dataset":
    case "push-model":
    case "push-dataset": {
      const [dir, id] = positionals;
      if (!dir || !id || positionals.length !== 2) {
        return { ok: false, error: `${kind} takes <dir> <id>` };
      }
      const target: RepoTarget = { dir: path.resolve(dir), id };
      if (values.revision) target.revision = values.revision;
      if (kind === "clone-model" || kind === "clone-dataset") {
        return { ok: true, command: { kind, ...target } };
      }
      if (!values.message) return { ok: false, error: `${kind} requires -m <message>` };
      return {
        ok: true,
        command: { kind, ...target, message: values.message, branch: values.branch, force },
      };
    }
    default:
      return { ok: false, error: `unknown command ${kind}` };
  }
}

export async function runCommand(
  command: Command,
  deps: ClientDependencies & { credentials?: FileCredentialStore } = {},
): Promise<string> {
  switch (command.kind) {
    case "login": {
      const store = deps.credentials ?? new FileCredentialStore();
      await store.saveToken(command.token);
      if (command.user) await store.saveUserInfo(command.user);
      return `credentials saved to ${store.dir}`;
    }
    case "clone-model": {
      const client = await RepositoryClient.open({
        ...deps,
        modelDir: command.dir,
        modelId: command.id,
        revision: command.revision,
      });
      return client.cloned ? `cloned ${client.remoteUrl} into ${client.modelDir}` : `${client.modelDir} is up to date`;
    }
    case "clone-dataset": {
      const client = await DatasetRepositoryClient.create({
        ...deps,
        workDir: command.dir,
        datasetId: command.id,
        revision: command.revision,
      });
      const dir = await client.clone();
      return dir ? `cloned ${client.repoUrl} into ${dir}` : `${client.workDir} is up to date`;
    }
    case "push-model": {
      const client = await RepositoryClient.open({
        ...deps,
        modelDir: command.dir,
        modelId: command.id,
        revision: command.revision,
      });
      await client.push(command.message, command.branch, command.force);
      return `pushed ${client.modelDir}`;
    }
    case "push-dataset": {
      const client = await DatasetRepositoryClient.create({
        ...deps,
        workDir: command.dir,
        datasetId: command.id,
        revision: command.revision,
      });
      await client.push(command.message, command.branch, command.force);
      return `pushed ${client.workDir}`;
    }
  }
}

async function main() {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    printUsage();
    process.exit(1);
  }
  const summary = await runCommand(parsed.command);
  console.log(summary);
}

/**
 * Whether `scriptPath` (usually `process.argv[1]`) runs the module at `moduleUrl`.
 * npm installs `bin` entries as symlinks while Node reports the resolved module
 * URL, so the script path is resolved through links before comparing.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) return false;
  let resolved: string;
  try {
    resolved = fs.realpathSync(scriptPath);
  } catch {
    resolved = path.resolve(scriptPath);
  }
  return moduleUrl === pathToFileURL(resolved).href;
}

const invokedDirectly = isEntryPoint(import.meta.url, process.argv[1]);

if (invokedDirectly) {
  main().catch((err) => {
    logger.error("hub-repo failed", err);
    process.exit(1);
  });
}
