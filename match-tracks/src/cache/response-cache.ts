import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createHash } from "node:crypto";
import type { CacheEntry, CacheKey, RawResponse } from "../model/types.js";
import { CacheError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";

/**
 * Read-through store of raw responses keyed by (normalized query, strategy).
 * Entries are written once; a later write for a live key is ignored.
 */
export interface ResponseCache {
  get(key: CacheKey): Promise<RawResponse | undefined>;
  set(key: CacheKey, response: RawResponse): Promise<void>;
  /** True once storage failed and the cache stopped being used */
  readonly bypassed: boolean;
}

export interface CacheOptions {
  ttlSeconds: number;
  /** Clock, in epoch milliseconds */
  now?: () => number;
  /** Called once when storage fails and the cache switches to bypass mode */
  onError?: (error: CacheError) => void;
}

/**
 * Case- and punctuation-insensitive form of a query. Letters of every script
 * are kept so distinct non-Latin queries stay distinct.
 */
function normalizeQuery(query: string): string {
  return query
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/**
 * Stable identity of a cache key
 */
export function cacheKeyId(key: CacheKey): string {
  return `${key.strategy}:${normalizeQuery(key.query)}`;
}

abstract class BaseResponseCache implements ResponseCache {
  private isBypassed = false;
  protected readonly ttlMs: number;
  protected readonly now: () => number;
  private readonly onError?: (error: CacheError) => void;

  constructor(options: CacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
    this.onError = options.onError;
  }

  get bypassed(): boolean {
    return this.isBypassed;
  }

  async get(key: CacheKey): Promise<RawResponse | undefined> {
    if (this.isBypassed) return undefined;
    try {
      const entry = await this.read(key);
      if (!entry) return undefined;
      if (this.isExpired(entry)) {
        await this.remove(key);
        return undefined;
      }
      return entry.response;
    } catch (error) {
      this.fail(error, "read");
      return undefined;
    }
  }

  async set(key: CacheKey, response: RawResponse): Promise<void> {
    if (this.isBypassed) return;
    const entry: CacheEntry = { key, response, createdAt: this.now() };
    try {
      await this.write(key, entry);
    } catch (error) {
      this.fail(error, "write");
    }
  }

  protected isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.createdAt > this.ttlMs;
  }

  private fail(error: unknown, operation: "read" | "write"): void {
    const cacheError =
      error instanceof CacheError
        ? error
        : new CacheError(`Cache ${operation} failed: ${errorMessage(error)}`, operation, error);
    this.isBypassed = true;
    logger.warn(`${cacheError.message}; continuing without cache`);
    this.onError?.(cacheError);
  }

  protected abstract read(key: CacheKey): Promise<CacheEntry | undefined>;
  /** Store an entry unless a live one exists */
  protected abstract write(key: CacheKey, entry: CacheEntry): Promise<void>;
  protected abstract remove(key: CacheKey): Promise<void>;
}

/**
 * Cache that lives for one run
 */
export class MemoryResponseCache extends BaseResponseCache {
  private entries = new Map<string, CacheEntry>();

  protected async read(key: CacheKey): Promise<CacheEntry | undefined> {
    return this.entries.get(cacheKeyId(key));
  }

  protected async write(key: CacheKey, entry: CacheEntry): Promise<void> {
    const id = cacheKeyId(key);
    const existing = this.entries.get(id);
    if (existing && !this.isExpired(existing)) return;
    this.entries.set(id, entry);
  }

  protected async remove(key: CacheKey): Promise<void> {
    this.entries.delete(cacheKeyId(key));
  }
}

/**
 * Content-addressed JSON files, one per key, persisted across runs.
 *
 * Files are created exclusively so the first writer wins; concurrent misses
 * for one key may both fetch, and the second write is dropped.
 */
export class FileResponseCache extends BaseResponseCache {
  constructor(
    private readonly directory: string,
    options: CacheOptions
  ) {
    super(options);
  }

  /**
   * Create the cache directory
   * @throws CacheError when the directory cannot be created
   */
  async init(): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new CacheError(
        `Cannot create cache directory ${this.directory}: ${errorMessage(error)}`,
        "init",
        error
      );
    }
  }

  filePath(key: CacheKey): string {
    const hash = createHash("sha1").update(cacheKeyId(key)).digest("hex");
    return path.join(this.directory, `${hash}.json`);
  }

  protected async read(key: CacheKey): Promise<CacheEntry | undefined> {
    const file = this.filePath(key);
    let content: string;
    try {
      content = await fs.readFile(file, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") return undefined;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      logger.debug(`Discarding unreadable cache file ${file}`);
      await this.remove(key);
      return undefined;
    }
    if (!isCacheEntry(parsed) || cacheKeyId(parsed.key) !== cacheKeyId(key)) {
      logger.debug(`Discarding mismatched cache file ${file}`);
      await this.remove(key);
      return undefined;
    }
    return parsed;
  }

  protected async write(key: CacheKey, entry: CacheEntry): Promise<void> {
    try {
      await fs.writeFile(this.filePath(key), JSON.stringify(entry), { flag: "wx" });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "EEXIST") return;
      throw error;
    }
  }

  protected async remove(key: CacheKey): Promise<void> {
    await fs.rm(this.filePath(key), { force: true });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (!isRecord(value) || typeof value.createdAt !== "number") return false;
  const { key, response } = value;
  return (
    isRecord(key) &&
    typeof key.query === "string" &&
    typeof key.strategy === "string" &&
    isRecord(response) &&
    typeof response.ok === "boolean" &&
    Array.isArray(response.documents)
  );
}

/**
 * Build the cache a run uses: files when a directory is configured, memory
 * otherwise. A directory that cannot be created falls back to bypass mode.
 */
export async function createResponseCache(
  settings: { enabled: boolean; directory?: string; ttlSeconds: number },
  options: Omit<CacheOptions, "ttlSeconds"> = {}
): Promise<ResponseCache | undefined> {
  if (!settings.enabled) return undefined;
  const cacheOptions: CacheOptions = { ...options, ttlSeconds: settings.ttlSeconds };
  if (!settings.directory) {
    return new MemoryResponseCache(cacheOptions);
  }

  const cache = new FileResponseCache(settings.directory, cacheOptions);
  try {
    await cache.init();
  } catch (error) {
    if (error instanceof CacheError) {
      logger.warn(`${error.message}; continuing without cache`);
      options.onError?.(error);
      return undefined;
    }
    throw error;
  }
  logger.debug(`Response cache at ${settings.directory}`);
  return cache;
}
