import { execFile } from "child_process";
import { promisify } from "util";
import { cfg } from "../config.js";
import { GitError } from "../errors.js";
import { logger } from "../logger.js";
import { removeTokenFromUrl, removeTokensFromText } from "./utils/remoteUtils.js";

const execGit = promisify(execFile);

export type GitRunOptions = { cwd?: string; gitPath?: string };
export type GitRunResult = { stdout: string; stderr?: string };

// Allow tests to override how git is executed without relying on spy semantics on ESM exports
type RunGitImpl = (args: string[], options: GitRunOptions) => Promise<GitRunResult>;
let runGitImpl: RunGitImpl | null = null;

export function gitEnv(): Record<string, string | undefined> {
  const env = { ...process.env };
  env.GIT_TERMINAL_PROMPT = "0";
  return env;
}

export function describeCommand(gitPath: string, args: string[]) {
  return [gitPath, ...args.map((arg) => removeTokenFromUrl(arg))].join(" ");
}

function errorField(error: unknown, key: "code" | "stderr"): unknown {
  if (error && typeof error === "object" && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

export async function runGit(args: string[], options: GitRunOptions = {}): Promise<GitRunResult> {
  const gitPath = options.gitPath || cfg.git.path;
  const command = describeCommand(gitPath, args);
  logger.debug("git exec", { command, cwd: options.cwd });
  try {
    if (runGitImpl) return await runGitImpl(args, { ...options, gitPath });
    return await execGit(gitPath, args, { cwd: options.cwd, env: gitEnv() });
  } catch (error) {
    if (error instanceof GitError) throw error;
    // The raw execFile error echoes the full command line, token included, so it is not kept as cause.
    const code = errorField(error, "code");
    const stderr = errorField(error, "stderr");
    const detail =
      typeof stderr === "string" && stderr.trim().length
        ? stderr
        : error instanceof Error
          ? error.message
          : String(error);
    throw new GitError(command, {
      exitCode: typeof code === "number" ? code : null,
      stderr: removeTokensFromText(detail),
    });
  }
}

// Test-only hook to override git execution
export function __setRunGitImplForTests(impl?: RunGitImpl | null) {
  runGitImpl = impl || null;
}
