import fetch, { RequestInit } from "node-fetch";
import { ProviderError, ProviderErrorCode, describeError } from "../errors";
import { ProviderKind } from "../types";

export interface HttpRequest {
  method: "POST";
  headers: Record<string, string>;
  body: string;
  timeout?: number; // node-fetch per-request timeout, ms
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type HttpFetch = (url: string, init: HttpRequest) => Promise<HttpResponse>;

type FetchSignal = NonNullable<RequestInit["signal"]>;

function isFetchSignal(signal: unknown): signal is FetchSignal {
  return typeof signal === "object" && signal !== null && "aborted" in signal && "addEventListener" in signal;
}

export const defaultFetch: HttpFetch = (url, init) => {
  const { signal, ...rest } = init;
  return fetch(url, { ...rest, signal: isFetchSignal(signal) ? signal : undefined });
};

export interface StatusClass {
  code: ProviderErrorCode;
  retryable: boolean;
}

// Backends may override the generic status mapping, e.g. for error bodies that carry a reason.
export type StatusClassifier = (status: number, body: string) => StatusClass | undefined;

export interface PostJsonArgs {
  fetchImpl: HttpFetch;
  url: string;
  headers?: Record<string, string>;
  body: unknown;
  timeoutMs?: number;
  signal?: AbortSignal;
  provider: ProviderKind;
  model: string;
  classify?: StatusClassifier;
}

export function classifyStatus(status: number): StatusClass {
  if (status === 429) return { code: "rate_limited", retryable: true };
  if (status === 408) return { code: "timeout", retryable: true };
  if (status >= 500) return { code: "server_error", retryable: true };
  if (status === 401 || status === 403) return { code: "auth", retryable: false };
  if (status === 404) return { code: "not_found", retryable: false };
  return { code: "bad_request", retryable: false };
}

export async function postJson(args: PostJsonArgs): Promise<unknown> {
  const { provider, model } = args;
  let text: string;
  let status: number;
  let ok: boolean;
  try {
    const resp = await args.fetchImpl(args.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...(args.headers ?? {}) },
      body: JSON.stringify(args.body),
      timeout: args.timeoutMs,
      signal: args.signal,
    });
    status = resp.status;
    ok = resp.ok;
    text = await resp.text();
  } catch (e) {
    throw transportError(e, provider, model);
  }

  if (!ok) {
    const cls = args.classify?.(status, text) ?? classifyStatus(status);
    throw new ProviderError({
      ...cls,
      message: `${provider} HTTP ${status}: ${text.slice(0, 200)}`,
      provider,
      model,
      status,
    });
  }

  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (e) {
    throw invalidResponse(provider, model, `response body is not JSON: ${text.slice(0, 120)}`, e);
  }
}

export function invalidResponse(provider: ProviderKind, model: string, detail: string, cause?: unknown): ProviderError {
  return new ProviderError({
    code: "invalid_response",
    message: `${provider} returned an unusable response: ${detail}`,
    retryable: false,
    provider,
    model,
    cause,
  });
}

export function requireApiKey(key: string | undefined, provider: ProviderKind, envName: string, model: string): string {
  if (!key) {
    throw new ProviderError({
      code: "configuration",
      message: `${envName} missing; cannot call ${provider} backend`,
      retryable: false,
      provider,
      model,
    });
  }
  if (/\s/.test(key.trim()) || key.trim().length < 8) {
    throw new ProviderError({ code: "auth", message: `${envName} is malformed`, retryable: false, provider, model });
  }
  return key.trim();
}

export function joinUrl(base: string, suffix: string): string {
  return base.replace(/\/+$/, "") + suffix;
}

// node-fetch rejects with FetchError { type: "request-timeout" | "system" | ... } or AbortError { type: "aborted" }
function transportError(e: unknown, provider: ProviderKind, model: string): ProviderError {
  const type = e instanceof Error && "type" in e ? e.type : undefined;
  if (type === "aborted") {
    return new ProviderError({ code: "aborted", message: `${provider} request aborted`, retryable: false, provider, model, cause: e });
  }
  const timedOut = type === "request-timeout" || type === "body-timeout";
  return new ProviderError({
    code: timedOut ? "timeout" : "network",
    message: `${provider} request failed: ${describeError(e)}`,
    retryable: true,
    provider,
    model,
    cause: e,
  });
}
