import fs from "fs";
import path from "path";

export type Level = "trace" | "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "json" | "pretty";
export type LogFields = Record<string, unknown>;

interface BaseCtx {
  service?: string;
  request_id?: string;
  task?: string;
  model?: string;
  file?: string;
}

export type LogSink = (line: string) => void;

export interface LogOptions {
  level?: Level;
  format?: LogFormat;
  sink?: LogSink;
  file?: string; // lines are appended here as well as to the sink
}

export interface Logger {
  child(ctx: BaseCtx): Logger;
  trace(msg: string, ctx?: LogFields): void;
  debug(msg: string, ctx?: LogFields): void;
  info(msg: string, ctx?: LogFields): void;
  warn(msg: string, ctx?: LogFields): void;
  error(msg: string, ctx?: LogFields): void;
}

const LEVELS: Level[] = ["trace", "debug", "info", "warn", "error", "silent"];

function levelIndex(l: Level): number { return LEVELS.indexOf(l); }

export function isLevel(value: unknown): value is Level {
  return typeof value === "string" && (LEVELS as string[]).includes(value);
}

function nowISO() { return new Date().toISOString(); }

export function fileSink(file: string): LogSink {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  return (line) => fs.appendFileSync(file, `${line}\n`, "utf8");
}

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const env = process.env;
  const lvl: Level = opts.level ?? (isLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info");
  const fmt: LogFormat = opts.format ?? (env.LOG_FORMAT === "json" ? "json" : "pretty");
  // eslint-disable-next-line no-console
  const out: LogSink = opts.sink ?? ((line: string) => console.log(line));
  const toFile = opts.file ? fileSink(opts.file) : undefined;
  const sink: LogSink = toFile ? (line) => { out(line); toFile(line); } : out;

  function emit(base: BaseCtx, level: Exclude<Level, "silent">, msg: string, extra?: LogFields) {
    if (levelIndex(level) < levelIndex(lvl)) return;
    const ts = nowISO();
    if (fmt === "json") {
      sink(JSON.stringify({ ts, level, msg, ...base, ...(extra ?? {}) }));
      return;
    }
    const { service: svc, ...rest } = base;
    const ctx = { ...rest, ...(extra ?? {}) };
    const head = `[${ts}] ${level.toUpperCase()}${svc ? ` ${svc}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    sink(`${head} - ${msg}${ctxStr}`);
  }

  function create(base: BaseCtx): Logger {
    return {
      child(ctx: BaseCtx) { return create({ ...base, ...ctx }); },
      trace(msg, ctx) { emit(base, "trace", msg, ctx); },
      debug(msg, ctx) { emit(base, "debug", msg, ctx); },
      info(msg, ctx) { emit(base, "info", msg, ctx); },
      warn(msg, ctx) { emit(base, "warn", msg, ctx); },
      error(msg, ctx) { emit(base, "error", msg, ctx); },
    };
  }

  return create({ service });
}
