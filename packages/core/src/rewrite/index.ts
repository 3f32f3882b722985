import {
  CacheError,
  HtmlProcessingError,
  ProviderError,
  TimeoutError,
  describeError,
} from "../errors";
import { extractSpans } from "../html/extractor";
import { identitySpans, reinject } from "../html/reinjector";
import { sameLanguage } from "../lang";
import { Logger, getLogger } from "../logger";
import { ProcessingOptionsInput, resolveOptions } from "../options";
import {
  Extraction,
  PipelineStage,
  ProcessingOptions,
  ProcessingResult,
  ProcessingStats,
  TokenUsage,
  TransformedSpan,
} from "../types";
import { BatchOptions, SpanBatch, batchSpans } from "./batcher";
import { ResponseCache, buildCacheKey } from "./cache";
import { decodeSegments, mergeBatch } from "./merge";
import { mapWithConcurrency, withDeadline } from "./pool";
import { buildPrompt } from "./prompts";
import { Completion, LLMProvider, Prompt, SubmitConfig } from "./provider";
import { DEFAULT_RETRY_POLICY, RetryPolicy, Sleep, withRetry } from "./retry";

export const DEFAULT_MAX_CONCURRENCY = 4;

export interface PipelineContext {
  provider: LLMProvider;
  cache?: ResponseCache;
  retry?: RetryPolicy;
  batching?: BatchOptions;
  maxConcurrency?: number;
  requestTimeoutMs?: number; // per provider attempt
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
}

function emptyStats(): ProcessingStats {
  return {
    total_tokens_in: 0,
    total_tokens_out: 0,
    processing_time: 0,
    cache_hits: 0,
    retries_performed: 0,
    spans_extracted: 0,
    spans_processed: 0,
    batches: 0,
    provider_calls: 0,
  };
}

function isNoOpTranslation(options: ProcessingOptions): boolean {
  return options.task === "translate" && sameLanguage(options.source_language, options.target_language);
}

/**
 * Rewrites the visible text of `html` with the configured provider and returns the
 * document with every element, attribute and node order intact. Either the whole
 * document is rewritten or a typed error is raised; there is no partial result.
 */
export async function processHtml(
  html: unknown,
  input: ProcessingOptionsInput,
  ctx: PipelineContext
): Promise<ProcessingResult> {
  const startedAt = Date.now();
  const options = resolveOptions(input);
  const log = (ctx.logger ?? getLogger("core")).child({ task: options.task, model: options.model });
  const stats = emptyStats();
  let stage: PipelineStage = "extracted";

  const enter = (next: PipelineStage) => {
    log.debug("pipeline.stage", { from: stage, to: next });
    stage = next;
  };

  log.info("pipeline.start", {
    provider: ctx.provider.kind,
    source_language: options.source_language,
    target_language: options.target_language,
    use_cache: options.use_cache,
  });

  try {
    const output = await withDeadline(
      options.timeout_ms,
      (signal) => run(signal),
      () => new TimeoutError(options.timeout_ms ?? 0, { task: options.task, model: options.model, stage })
    );
    enter("done");
    stats.processing_time = (Date.now() - startedAt) / 1000;
    log.info("pipeline.done", { ...stats });
    return { html: output, stats };
  } catch (e) {
    const failedAt = stage;
    enter("errored");
    if (e instanceof HtmlProcessingError) {
      e.withContext({ task: options.task, model: options.model, stage: failedAt });
    }
    log.error("pipeline.failed", {
      stage: failedAt,
      error: describeError(e),
      code: e instanceof HtmlProcessingError ? e.code : undefined,
      attempts: e instanceof ProviderError ? e.attempts : undefined,
    });
    throw e;
  }

  async function run(signal: AbortSignal): Promise<string> {
    const extraction = extractSpans(html, { minTextLength: options.min_text_length, logger: log });
    stats.spans_extracted = extraction.spans.length;

    if (isNoOpTranslation(options)) {
      log.info("pipeline.noop", { reason: "source and target language match" });
      return identity(extraction);
    }
    if (extraction.spans.length === 0) {
      log.info("pipeline.noop", { reason: "no translatable text" });
      return identity(extraction);
    }

    enter("prompted");
    const batches = batchSpans(extraction.spans, ctx.batching);
    stats.batches = batches.length;
    log.debug("pipeline.batched", { spans: extraction.spans.length, batches: batches.length });

    const perBatch = await mapWithConcurrency(
      batches,
      ctx.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY,
      (batch) => transformBatch(batch, signal),
      signal
    );
    enter("merged");
    const transformed: TransformedSpan[] = perBatch.flat();
    stats.spans_processed = transformed.length;

    enter("reinjected");
    return reinject(extraction, transformed, { preserveFormatting: options.preserve_formatting });
  }

  function identity(extraction: Extraction): string {
    enter("reinjected");
    return reinject(extraction, identitySpans(extraction), { preserveFormatting: true });
  }

  function addUsage(usage: TokenUsage) {
    stats.total_tokens_in += usage.tokens_in;
    stats.total_tokens_out += usage.tokens_out;
  }

  async function transformBatch(batch: SpanBatch, signal: AbortSignal): Promise<TransformedSpan[]> {
    const prompt = buildPrompt(batch.spans, options);
    const cache = options.use_cache ? ctx.cache : undefined;
    const key = cache ? cacheKey(prompt) : undefined;

    if (cache && key) {
      const hit = await readCache(cache, key);
      const segments = hit ? decodeSegments(hit.text, batch.spans.length) : null;
      if (hit && segments && segments.length === batch.spans.length) {
        enter("cached");
        stats.cache_hits += batch.spans.length;
        addUsage(hit.usage);
        log.debug("cache.hit", { batch: batch.index, spans: batch.spans.length });
        return mergeBatch(batch, segments);
      }
      log.debug("cache.miss", { batch: batch.index });
    }

    enter("called");
    const config: SubmitConfig = {
      model: options.model,
      temperature: options.temperature,
      max_tokens: options.max_tokens,
      timeout_ms: ctx.requestTimeoutMs,
      signal,
      logger: log,
    };
    const { value: completion } = await withRetry(
      () => {
        stats.provider_calls++;
        return ctx.provider.submit(prompt, config);
      },
      ctx.retry ?? DEFAULT_RETRY_POLICY,
      {
        signal,
        sleep: ctx.sleep,
        random: ctx.random,
        onRetry: ({ attempt, delayMs, error }) => {
          stats.retries_performed++;
          log.warn("provider.retry", { batch: batch.index, attempt, delay_ms: delayMs, code: error.code, error: error.message });
        },
      }
    );
    addUsage(completion.usage);

    const segments = decodeSegments(completion.text, batch.spans.length);
    if (!segments) {
      throw new ProviderError({
        code: "invalid_response",
        message: `Batch ${batch.index}: response is not a JSON array of ${batch.spans.length} segments`,
        retryable: false,
        provider: ctx.provider.kind,
        model: options.model,
      });
    }
    const merged = mergeBatch(batch, segments);
    // A completion that lands after the deadline is discarded, not cached.
    if (cache && key && !signal.aborted) await writeCache(cache, key, completion);
    return merged;
  }

  function cacheKey(prompt: Prompt): string {
    return buildCacheKey({
      prompt,
      model: options.model,
      task: options.task,
      source_language: options.source_language,
      target_language: options.target_language,
    });
  }

  // Cache failures never fail the pipeline; they read as misses.
  async function readCache(cache: ResponseCache, key: string): Promise<Completion | undefined> {
    try {
      return await cache.get(key);
    } catch (e) {
      if (!(e instanceof CacheError)) throw e;
      log.warn("cache.read_failed", { error: e.message });
      return undefined;
    }
  }

  async function writeCache(cache: ResponseCache, key: string, completion: Completion): Promise<void> {
    try {
      await cache.put(key, completion);
    } catch (e) {
      if (!(e instanceof CacheError)) throw e;
      log.warn("cache.write_failed", { error: e.message });
    }
  }
}
