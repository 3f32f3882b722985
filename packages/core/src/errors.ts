import { PipelineStage, ProviderKind, Task } from "./types";

export interface ErrorContext {
  task?: Task;
  model?: string;
  stage?: PipelineStage;
  attempts?: number;
  provider?: ProviderKind;
}

export class HtmlProcessingError extends Error {
  readonly code: string;
  context: ErrorContext;

  constructor(code: string, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  // Fills only what the error does not already know.
  withContext(context: ErrorContext): this {
    const own = this.context;
    this.context = {
      task: own.task ?? context.task,
      model: own.model ?? context.model,
      stage: own.stage ?? context.stage,
      attempts: own.attempts ?? context.attempts,
      provider: own.provider ?? context.provider,
    };
    return this;
  }
}

export type ExtractionErrorCode = "invalid_input" | "empty" | "too_large" | "parse_failed";

export class ExtractionError extends HtmlProcessingError {
  declare readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, { stage: "extracted" }, options);
  }
}

export type ProviderErrorCode =
  | "rate_limited"
  | "server_error"
  | "network"
  | "timeout"
  | "auth"
  | "bad_request"
  | "not_found"
  | "invalid_response"
  | "configuration"
  | "aborted"
  | "unknown";

export interface ProviderErrorInit {
  code: ProviderErrorCode;
  message: string;
  retryable: boolean;
  provider?: ProviderKind;
  model?: string;
  status?: number;
  attempts?: number;
  cause?: unknown;
}

export class ProviderError extends HtmlProcessingError {
  declare readonly code: ProviderErrorCode;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(init: ProviderErrorInit) {
    super(
      init.code,
      init.message,
      { provider: init.provider, model: init.model, attempts: init.attempts },
      { cause: init.cause }
    );
    this.retryable = init.retryable;
    this.status = init.status;
  }

  get attempts(): number {
    return this.context.attempts ?? 1;
  }

  withAttempts(attempts: number): ProviderError {
    const next = new ProviderError({
      code: this.code,
      message: attempts > 1 ? `${this.message} (after ${attempts} attempts)` : this.message,
      retryable: this.retryable,
      provider: this.context.provider,
      model: this.context.model,
      status: this.status,
      attempts,
      cause: this.cause,
    });
    next.context = { ...this.context, attempts };
    return next;
  }
}

export class CacheError extends HtmlProcessingError {
  constructor(operation: "get" | "put" | "clear" | "size", cause: unknown) {
    super(`cache_${operation}_failed`, `Cache ${operation} failed: ${describeError(cause)}`, {}, { cause });
  }
}

export type ReinjectionErrorCode = "count_mismatch" | "unknown_id" | "duplicate_id" | "unresolvable_path";

export class ReinjectionError extends HtmlProcessingError {
  declare readonly code: ReinjectionErrorCode;

  constructor(code: ReinjectionErrorCode, message: string) {
    super(code, message, { stage: "reinjected" });
  }
}

export class TimeoutError extends HtmlProcessingError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context: ErrorContext = {}) {
    super("deadline_exceeded", `Processing exceeded the ${timeoutMs}ms deadline`, context);
    this.timeoutMs = timeoutMs;
  }
}

export class OptionsError extends HtmlProcessingError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid_options", `Invalid processing options: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class ConfigError extends HtmlProcessingError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid_config", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
