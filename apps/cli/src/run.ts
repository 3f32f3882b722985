import { promises as fs } from "fs";
import path from "path";
import { parseArgs } from "util";
import {
  ConfigError,
  LLMProvider,
  Logger,
  OptionsError,
  ProcessingOptions,
  ProcessingStats,
  ResponseCache,
  Task,
  createProviderFromConfig,
  createResponseCache,
  describeError,
  getLogger,
  isLevel,
  loadConfig,
  processHtml,
  resolveOptions,
} from "@llm-html/core";

export const USAGE = `Usage: llm-html <input> [options]

Rewrite the text of an HTML file, or of every *.html file in a directory.

Options:
  -o, --output <path>         output file or directory (default: overwrite input)
  -t, --task <task>           translate | paraphrase | summarize | custom (default: paraphrase)
  -l, --language <code>       source language (default: he)
      --target-language <c>   target language for translate
  -m, --model <name>          model (default: DEFAULT_MODEL or gpt-4o-mini)
      --temperature <n>       sampling temperature (default: 0.7)
      --max-tokens <n>        max output tokens per call (default: 2048)
      --prompt <text>         instruction for the custom task
      --min-text-length <n>   shortest text to rewrite (default: 2)
      --no-cache              do not read or write the response cache
      --clear-cache           clear the response cache before processing
  -r, --recursive             include *.html files in subdirectories
      --stats-file <path>     write run statistics as JSON
      --log-level <level>     trace | debug | info | warn | error | silent
      --log-file <path>       also append log lines to this file (default: LLM_LOG_FILE)
  -h, --help                  show this help
`;

export interface FileResult {
  file: string;
  output?: string;
  status: "success" | "error";
  stats?: ProcessingStats;
  error?: string;
}

export interface RunStats {
  files: FileResult[];
  total_tokens_in: number;
  total_tokens_out: number;
  total_time: number;
  cache_hits: number;
  errors: number;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  stderr?: (line: string) => void;
  stdout?: (line: string) => void;
  providerFactory?: (model: string, logger: Logger) => LLMProvider;
  cache?: ResponseCache;
}

class UsageError extends Error {}

const TASKS: readonly Task[] = ["translate", "paraphrase", "summarize", "custom"];

function parseTask(raw: string | undefined): Task | undefined {
  if (raw === undefined) return undefined;
  const task = TASKS.find((t) => t === raw);
  if (!task) throw new UsageError(`unknown task "${raw}"`);
  return task;
}

function parseNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!raw.trim() || !Number.isFinite(n)) throw new UsageError(`--${flag} expects a number, got "${raw}"`);
  return n;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        output: { type: "string", short: "o" },
        task: { type: "string", short: "t" },
        language: { type: "string", short: "l" },
        "target-language": { type: "string" },
        model: { type: "string", short: "m" },
        temperature: { type: "string" },
        "max-tokens": { type: "string" },
        prompt: { type: "string" },
        "min-text-length": { type: "string" },
        "no-cache": { type: "boolean" },
        "clear-cache": { type: "boolean" },
        recursive: { type: "boolean", short: "r" },
        "stats-file": { type: "string" },
        "log-level": { type: "string" },
        "log-file": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (e) {
    throw new UsageError(describeError(e));
  }
}

async function listHtmlFiles(dir: string, recursive: boolean): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const out: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory() && recursive) out.push(...(await listHtmlFiles(full, recursive)));
    else if (entry.isFile() && entry.name.toLowerCase().endsWith(".html")) out.push(full);
  }
  return out;
}

/** Runs the command line and resolves to the process exit code: 0 ok, 1 a file failed, 2 usage. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));

  let args: ReturnType<typeof readArgs>;
  let options: ProcessingOptions;
  let config: ReturnType<typeof loadConfig>;
  try {
    args = readArgs(argv);
    if (args.values.help) {
      stdout(USAGE);
      return 0;
    }
    config = loadConfig(env);
    const v = args.values;
    if (args.positionals.length !== 1) throw new UsageError("expected exactly one input file or directory");
    if (v["log-level"] !== undefined && !isLevel(v["log-level"])) {
      throw new UsageError(`unknown log level "${v["log-level"]}"`);
    }
    options = resolveOptions({
      task: parseTask(v.task),
      source_language: v.language,
      target_language: v["target-language"],
      model: v.model ?? config.default_model,
      temperature: parseNumber("temperature", v.temperature),
      max_tokens: parseNumber("max-tokens", v["max-tokens"]),
      extra_prompt: v.prompt,
      min_text_length: parseNumber("min-text-length", v["min-text-length"]),
      use_cache: !v["no-cache"],
    });
  } catch (e) {
    if (e instanceof UsageError || e instanceof OptionsError || e instanceof ConfigError) {
      stderr(`llm-html: ${e.message}`);
      stderr(USAGE);
      return 2;
    }
    throw e;
  }

  const v = args.values;
  const level = v["log-level"];
  const log = getLogger("cli", {
    level: isLevel(level) ? level : config.log.level,
    format: config.log.format,
    sink: stderr,
    file: v["log-file"] ?? config.log.file,
  }).child({ task: options.task, model: options.model });

  const cache = deps.cache ?? createResponseCache(config.cache);
  if (v["clear-cache"]) {
    await cache.clear();
    log.info("cache.clear");
  }
  const provider = deps.providerFactory?.(options.model, log) ?? createProviderFromConfig(config, options.model, undefined, log);

  const input = args.positionals[0];
  const stats: RunStats = { files: [], total_tokens_in: 0, total_tokens_out: 0, total_time: 0, cache_hits: 0, errors: 0 };

  const processFile = async (file: string, output: string, fileLog: Logger) => {
    try {
      fileLog.info("file.start");
      const html = await fs.readFile(file, "utf8");
      const result = await processHtml(html, options, {
        provider,
        cache,
        retry: config.retry,
        batching: config.batching,
        maxConcurrency: config.max_concurrency,
        requestTimeoutMs: config.request_timeout_ms,
        logger: fileLog,
      });
      await fs.mkdir(path.dirname(output), { recursive: true });
      await fs.writeFile(output, result.html, "utf8");
      stats.files.push({ file, output, status: "success", stats: result.stats });
      stats.total_tokens_in += result.stats.total_tokens_in;
      stats.total_tokens_out += result.stats.total_tokens_out;
      stats.total_time += result.stats.processing_time;
      stats.cache_hits += result.stats.cache_hits;
      fileLog.info("file.saved", { output });
    } catch (e) {
      stats.files.push({ file, status: "error", error: describeError(e) });
      stats.errors++;
      fileLog.error("file.failed", { error: describeError(e) });
    }
  };

  let isDir: boolean;
  try {
    isDir = (await fs.stat(input)).isDirectory();
  } catch (e) {
    log.error("input.unreadable", { input, error: describeError(e) });
    return 1;
  }

  if (isDir) {
    const files = await listHtmlFiles(input, Boolean(v.recursive));
    log.info("dir.start", { input, files: files.length, recursive: Boolean(v.recursive) });
    for (const file of files) {
      const output = v.output ? path.join(v.output, path.relative(input, file)) : file;
      await processFile(file, output, log.child({ file }));
    }
  } else {
    await processFile(input, v.output ?? input, log.child({ file: input }));
  }

  if (v["stats-file"]) {
    await fs.writeFile(v["stats-file"], JSON.stringify(stats, null, 2), "utf8");
    log.info("stats.saved", { path: v["stats-file"] });
  }
  log.info("run.done", {
    files: stats.files.length,
    tokens_in: stats.total_tokens_in,
    tokens_out: stats.total_tokens_out,
    seconds: Number(stats.total_time.toFixed(2)),
    errors: stats.errors,
  });
  return stats.errors === 0 ? 0 : 1;
}
