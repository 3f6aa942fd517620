import fs from "fs";
import path from "path";
import { cfg } from "./config.js";
import { removeTokensFromText } from "./git/utils/remoteUtils.js";

const LEVELS = ["error", "warn", "info", "debug", "trace"] as const;
type Level = (typeof LEVELS)[number];

function rank(value: string): number {
  return LEVELS.findIndex((level) => level === value);
}

const threshold = rank(cfg.log.level) >= 0 ? rank(cfg.log.level) : rank("info");

const consoleFor: Record<Level, (...data: unknown[]) => void> = {
  error: (...data) => console.error(...data),
  warn: (...data) => console.warn(...data),
  info: (...data) => console.log(...data),
  debug: (...data) => console.log(...data),
  trace: (...data) => console.log(...data),
};

// undefined: not opened yet; null: no file, or opening failed and file output is off.
let fileSink: fs.WriteStream | null | undefined;

function openFileSink(): fs.WriteStream | null {
  if (fileSink !== undefined) return fileSink;
  fileSink = null;
  if (!cfg.log.file) return null;
  try {
    fs.mkdirSync(path.dirname(cfg.log.file), { recursive: true });
  } catch (e) {
    console.error("[hub-repo] cannot create log directory", e);
    return null;
  }
  try {
    const stream = fs.createWriteStream(cfg.log.file, { flags: "a" });
    stream.on("error", (err) => {
      console.error("[hub-repo] log file write failed", err);
      stream.destroy();
      fileSink = null;
    });
    fileSink = stream;
  } catch (e) {
    console.error("[hub-repo] cannot open log file", e);
  }
  return fileSink;
}

/** JSON-safe copy of `value`; errors keep name, message and stack, and URLs lose their credentials. */
function toMeta(value: unknown): unknown {
  if (typeof value === "string") return removeTokensFromText(value);
  if (value instanceof Error) {
    const out: Record<string, unknown> = {
      name: value.name,
      message: toMeta(value.message),
      stack: value.stack === undefined ? undefined : toMeta(value.stack),
    };
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) out[key] = toMeta(field);
    }
    return out;
  }
  if (Array.isArray(value)) return value.map(toMeta);
  if (value && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, field]) => [key, toMeta(field)]));
  }
  return value;
}

function emit(level: Level, message: string, meta?: unknown) {
  if (rank(level) > threshold) return;
  const msg = removeTokensFromText(message);
  const data = meta === undefined ? undefined : toMeta(meta);

  if (cfg.log.console) {
    const line = `[${level}] ${msg}`;
    if (data === undefined) consoleFor[level](line);
    else consoleFor[level](line, data);
  }

  const sink = openFileSink();
  if (sink) {
    sink.write(JSON.stringify({ ts: new Date().toISOString(), level, msg, meta: data }) + "\n");
  }
}

export const logger = {
  error: (message: string, meta?: unknown) => emit("error", message, meta),
  warn: (message: string, meta?: unknown) => emit("warn", message, meta),
  info: (message: string, meta?: unknown) => emit("info", message, meta),
  debug: (message: string, meta?: unknown) => emit("debug", message, meta),
  trace: (message: string, meta?: unknown) => emit("trace", message, meta),
};
