import "dotenv/config";
import os from "os";
import path from "path";

function expandHome(p: string): string {
  return p.replace(
    /^~(?=$|\/|\\)/,
    process.env.HOME || process.env.USERPROFILE || os.homedir(),
  );
}

function bool(v: string | undefined, def = false) {
  if (v === undefined) return def;
  return ["1", "true", "yes", "on"].includes(v.toLowerCase());
}

function nonEmpty(value: string | undefined, fallback: string): string {
  const trimmed = (value || "").trim();
  return trimmed.length ? trimmed : fallback;
}

const hubEndpoint = nonEmpty(
  process.env.HUB_ENDPOINT,
  "https://www.modelscope.cn",
).replace(/\/+$/, "");

const credentialsPath = path.resolve(
  expandHome(nonEmpty(process.env.HUB_CREDENTIALS_PATH, "~/.hub/credentials")),
);

const logLevelRaw = (process.env.LOG_LEVEL || "info").toLowerCase();
const logConsole = bool(process.env.LOG_CONSOLE, true);
const logFile = (() => {
  const custom = process.env.LOG_FILE;
  if (custom && custom.trim().length) return path.resolve(custom);
  return "";
})();

export const cfg = {
  hub: {
    endpoint: hubEndpoint,
    defaultModelRevision: nonEmpty(
      process.env.HUB_DEFAULT_MODEL_REVISION,
      "master",
    ),
    defaultDatasetRevision: nonEmpty(
      process.env.HUB_DEFAULT_DATASET_REVISION,
      "master",
    ),
    credentialsPath,
  },

  git: {
    path: nonEmpty(process.env.GIT_PATH, "git"),
  },

  log: {
    level: logLevelRaw,
    file: logFile,
    console: logConsole,
  },
};
