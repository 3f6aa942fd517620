import fs from "fs/promises";
import path from "path";

export type RepoPath = {
  baseDir: string;
  repoName: string;
};

export function splitRepoPath(dir: string): RepoPath {
  const resolved = path.resolve(dir);
  return { baseDir: path.dirname(resolved), repoName: path.basename(resolved) };
}

export async function ensureDirectory(dir: string) {
  await fs.mkdir(dir, { recursive: true });
}

export async function directoryExists(p: string) {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export async function isDirectoryEmpty(dir: string) {
  if (!(await directoryExists(dir))) return true;
  const entries = await fs.readdir(dir);
  return entries.length === 0;
}
