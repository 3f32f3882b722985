import { createHash } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { CacheError } from "../errors";
import { Task } from "../types";
import { Completion, Prompt } from "./provider";

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_CACHE_MAX_ENTRIES = 1000;

const CacheEntrySchema = z.object({
  value: z.string(),
  usage: z.object({ tokens_in: z.number(), tokens_out: z.number() }),
  created_at: z.number(),
  ttl_ms: z.number(),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  set(key: string, entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  keys(): Promise<string[]>;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  async get(key: string) { return this.entries.get(key); }
  async set(key: string, entry: CacheEntry) {
    this.entries.delete(key);
    this.entries.set(key, entry);
  }
  async delete(key: string) { this.entries.delete(key); }
  async clear() { this.entries.clear(); }
  async keys() { return Array.from(this.entries.keys()); }
}

const SAFE_KEY = /^[A-Za-z0-9_-]+$/;

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/** One JSON file per key. Unparseable files read as misses. */
export class FileCacheStore implements CacheStore {
  constructor(private readonly dir: string) {}

  private file(key: string): string {
    if (!SAFE_KEY.test(key)) throw new Error(`unsafe cache key: ${key}`);
    return path.join(this.dir, `${key}.json`);
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file(key), "utf8");
    } catch (e) {
      if (isNotFound(e)) return undefined;
      throw e;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return undefined;
    }
    const parsed = CacheEntrySchema.safeParse(json);
    return parsed.success ? parsed.data : undefined;
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(this.file(key), JSON.stringify(entry), "utf8");
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.file(key), { force: true });
  }

  async clear(): Promise<void> {
    for (const key of await this.keys()) await this.delete(key);
  }

  async keys(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (e) {
      if (isNotFound(e)) return [];
      throw e;
    }
    return names.filter((n) => n.endsWith(".json")).map((n) => n.slice(0, -".json".length));
  }
}

export interface ResponseCacheOptions {
  ttlMs?: number;
  maxEntries?: number;
  store?: CacheStore;
  now?: () => number;
}

/**
 * Memoizes provider completions by cache key. Entries expire lazily on read; nothing sweeps
 * in the background. Store failures surface as CacheError.
 */
export class ResponseCache {
  private readonly store: CacheStore;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private ttl: number;

  constructor(opts: ResponseCacheOptions = {}) {
    this.store = opts.store ?? new MemoryCacheStore();
    this.maxEntries = opts.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
    this.now = opts.now ?? Date.now;
    this.ttl = validTtl(opts.ttlMs ?? DEFAULT_CACHE_TTL_MS);
  }

  get ttlMs(): number {
    return this.ttl;
  }

  set ttlMs(value: number) {
    this.ttl = validTtl(value);
  }

  async get(key: string): Promise<Completion | undefined> {
    try {
      const entry = await this.store.get(key);
      if (!entry) return undefined;
      if (this.now() - entry.created_at >= entry.ttl_ms) {
        // a put may have replaced the entry since it was read
        const current = await this.store.get(key);
        if (current && current.created_at === entry.created_at) await this.store.delete(key);
        return undefined;
      }
      return { text: entry.value, usage: entry.usage };
    } catch (e) {
      throw new CacheError("get", e);
    }
  }

  async put(key: string, value: Completion, ttlMs: number = this.ttl): Promise<void> {
    try {
      await this.store.set(key, { value: value.text, usage: value.usage, created_at: this.now(), ttl_ms: validTtl(ttlMs) });
      await this.evictOverflow();
    } catch (e) {
      throw new CacheError("put", e);
    }
  }

  async clear(): Promise<void> {
    try {
      await this.store.clear();
    } catch (e) {
      throw new CacheError("clear", e);
    }
  }

  async size(): Promise<number> {
    try {
      return (await this.store.keys()).length;
    } catch (e) {
      throw new CacheError("size", e);
    }
  }

  // oldest created_at goes first
  private async evictOverflow(): Promise<void> {
    const keys = await this.store.keys();
    if (keys.length <= this.maxEntries) return;
    const aged: Array<{ key: string; created_at: number }> = [];
    for (const key of keys) {
      const entry = await this.store.get(key);
      aged.push({ key, created_at: entry?.created_at ?? 0 });
    }
    aged.sort((a, b) => a.created_at - b.created_at);
    for (const { key } of aged.slice(0, keys.length - this.maxEntries)) await this.store.delete(key);
  }
}

function validTtl(ms: number): number {
  if (!Number.isFinite(ms) || ms <= 0) throw new RangeError(`cache ttl must be a positive number of ms, got ${ms}`);
  return ms;
}

export interface CacheKeyParts {
  prompt: Prompt;
  model: string;
  task: Task;
  source_language: string;
  target_language: string;
}

export function normalizePromptText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

// The user message is a JSON array of segment texts; whitespace inside a segment is
// escaped there, so each segment is normalized on its own.
function normalizeUserPayload(user: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(user);
  } catch {
    return normalizePromptText(user);
  }
  if (!Array.isArray(parsed) || !parsed.every((s): s is string => typeof s === "string")) {
    return normalizePromptText(user);
  }
  return JSON.stringify(parsed.map(normalizePromptText));
}

export function buildCacheKey(parts: CacheKeyParts): string {
  const payload = JSON.stringify([
    normalizePromptText(parts.prompt.system),
    normalizeUserPayload(parts.prompt.user),
    parts.model,
    parts.task,
    parts.source_language.toLowerCase(),
    parts.target_language.toLowerCase(),
  ]);
  return createHash("sha256").update(payload).digest("hex");
}

export interface CacheSettings {
  ttl_seconds: number;
  max_entries: number;
  dir?: string;
}

export function createResponseCache(settings: CacheSettings): ResponseCache {
  return new ResponseCache({
    ttlMs: settings.ttl_seconds * 1000,
    maxEntries: settings.max_entries,
    store: settings.dir ? new FileCacheStore(settings.dir) : undefined,
  });
}
