import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import {
  AppConfig,
  ExtractionError,
  HtmlProcessingError,
  LLMProvider,
  Logger,
  OptionsError,
  ProviderError,
  ResponseCache,
  TimeoutError,
  createProviderFromConfig,
  describeError,
  formatIssues,
  processHtml,
} from "@llm-html/core";

export type ProviderFactory = (model: string, logger: Logger) => LLMProvider;

export interface AppDeps {
  config: AppConfig;
  cache: ResponseCache;
  logger: Logger;
  providerFactory?: ProviderFactory;
  accessLog?: boolean; // morgan, errors only
}

const ProcessBodySchema = z.object({
  html: z.string(),
  task: z.enum(["translate", "paraphrase", "summarize", "custom"]).optional(),
  source_language: z.string().optional(),
  language: z.string().optional(),
  target_language: z.string().optional(),
  model: z.string().optional(),
  temperature: z.number().optional(),
  max_tokens: z.number().optional(),
  preserve_formatting: z.boolean().optional(),
  use_cache: z.boolean().optional(),
  extra_prompt: z.string().optional(),
  prompt: z.string().optional(),
  min_text_length: z.number().optional(),
  timeout_ms: z.number().optional(),
});

// ten years
export const MAX_CACHE_TTL_SECONDS = 10 * 365 * 24 * 60 * 60;

const CacheTtlSchema = z.object({ ttl_seconds: z.number().positive().finite().max(MAX_CACHE_TTL_SECONDS) });

type Handler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward rejected promises to the error handler.
function route(fn: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function requestId(res: Response): string {
  const id: unknown = res.locals.request_id;
  return typeof id === "string" ? id : "";
}

export function statusFor(e: unknown): number {
  if (e instanceof OptionsError) return 400;
  if (e instanceof ExtractionError) return 422;
  if (e instanceof TimeoutError) return 504;
  if (e instanceof ProviderError) return e.code === "configuration" ? 500 : 502;
  return 500;
}

function httpStatusOf(e: unknown): number | undefined {
  if (e instanceof Error && "status" in e && typeof e.status === "number") return e.status;
  return undefined;
}

export function createApp(deps: AppDeps): express.Express {
  const { config, cache, logger } = deps;
  const providerFor: ProviderFactory =
    deps.providerFactory ?? ((model, log) => createProviderFromConfig(config, model, undefined, log));

  const app = express();
  app.use(express.json({ limit: "10mb" }));
  app.use(cors());
  app.use(helmet());
  if (deps.accessLog ?? true) {
    app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  }
  app.use((req: Request, res: Response, next: NextFunction) => {
    const id = req.get("x-request-id") || uuidv4();
    res.locals.request_id = id;
    res.setHeader("x-request-id", id);
    next();
  });

  async function cacheInfo() {
    return { ttl_seconds: cache.ttlMs / 1000, entries: await cache.size() };
  }

  app.get("/health", (_req: Request, res: Response) => res.json({ ok: true }));

  // POST /process { html, task?, source_language|language?, ..., extra_prompt|prompt? }
  app.post("/process", route(async (req, res) => {
    const parsed = ProcessBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_request", details: formatIssues(parsed.error) });
    }
    const b = parsed.data;
    const id = requestId(res);
    const model = b.model ?? config.default_model;
    const log = logger.child({ request_id: id });
    log.info("process.request", { chars: b.html.length, task: b.task, model });

    const result = await processHtml(
      b.html,
      {
        task: b.task,
        source_language: b.source_language ?? b.language,
        target_language: b.target_language,
        model,
        temperature: b.temperature,
        max_tokens: b.max_tokens,
        preserve_formatting: b.preserve_formatting,
        use_cache: b.use_cache,
        extra_prompt: b.extra_prompt ?? b.prompt,
        min_text_length: b.min_text_length,
        timeout_ms: b.timeout_ms,
      },
      {
        provider: providerFor(model, log),
        cache,
        retry: config.retry,
        batching: config.batching,
        maxConcurrency: config.max_concurrency,
        requestTimeoutMs: config.request_timeout_ms,
        logger: log,
      }
    );
    return res.json({ id, html: result.html, stats: result.stats });
  }));

  app.get("/cache", route(async (_req, res) => res.json(await cacheInfo())));

  app.put("/cache/ttl", route(async (req, res) => {
    const parsed = CacheTtlSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_request", details: formatIssues(parsed.error) });
    }
    cache.ttlMs = parsed.data.ttl_seconds * 1000;
    logger.info("cache.ttl.set", { request_id: requestId(res), ttl_seconds: parsed.data.ttl_seconds });
    return res.json(await cacheInfo());
  }));

  app.delete("/cache", route(async (_req, res) => {
    await cache.clear();
    logger.info("cache.clear", { request_id: requestId(res) });
    return res.json(await cacheInfo());
  }));

  // Express recognises error middleware by its four parameters.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const id = requestId(res);
    if (err instanceof OptionsError) {
      return res.status(400).json({ error: "invalid_request", details: err.issues });
    }
    const bodyStatus = httpStatusOf(err);
    if (!(err instanceof HtmlProcessingError) && bodyStatus && bodyStatus < 500) {
      // body-parser: malformed JSON, payload too large
      return res.status(bodyStatus).json({ error: "invalid_request", details: [describeError(err)] });
    }
    const status = statusFor(err);
    const level = status >= 500 ? "error" : "warn";
    logger[level]("process.error", { request_id: id, status, error: describeError(err) });
    if (err instanceof HtmlProcessingError) {
      return res.status(status).json({ error: err.code, message: err.message, context: err.context });
    }
    return res.status(500).json({ error: "internal_error", message: describeError(err) });
  });

  return app;
}
