import { ApiErrorResponse } from "@/lib/api-response";

export interface RateLimitConfig {
  /** Window length in milliseconds. */
  windowMs: number;
  /** Requests allowed per identifier within one window. */
  limit: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetAt: number;
  retryAfter: number;
  headers: Record<string, string>;
}

interface RateLimitEntry {
  count: number;
  expiresAt: number;
}

type RateLimitStore = Map<string, Map<string, RateLimitEntry>>;

interface GlobalRateLimitStore {
  __rateLimitStore?: RateLimitStore;
}

// Kept on globalThis so dev-server module reloads share one store.
function getGlobalStore(): RateLimitStore {
  const globalScope: typeof globalThis & GlobalRateLimitStore = globalThis;
  if (!globalScope.__rateLimitStore) {
    globalScope.__rateLimitStore = new Map();
  }
  return globalScope.__rateLimitStore;
}

function getBucket(store: RateLimitStore, bucket: string) {
  let bucketStore = store.get(bucket);
  if (!bucketStore) {
    bucketStore = new Map();
    store.set(bucket, bucketStore);
  }
  return bucketStore;
}

const nextSweepAt = new WeakMap<Map<string, RateLimitEntry>, number>();

// Drops expired callers at most once per window.
function pruneExpired(bucketStore: Map<string, RateLimitEntry>, now: number, windowMs: number) {
  if (now < (nextSweepAt.get(bucketStore) ?? 0)) {
    return;
  }
  for (const [identifier, entry] of bucketStore) {
    if (entry.expiresAt <= now) {
      bucketStore.delete(identifier);
    }
  }
  nextSweepAt.set(bucketStore, now + windowMs);
}

/** Number of callers currently tracked in a bucket. */
export function countRateLimitEntries(bucket: string) {
  return getGlobalStore().get(bucket)?.size ?? 0;
}

export function resetRateLimits(bucket?: string) {
  const store = getGlobalStore();
  if (bucket) {
    store.delete(bucket);
  } else {
    store.clear();
  }
}

export interface ConsumeRateLimitOptions extends RateLimitConfig {
  /** Caller identity within the bucket, such as a user id or IP. */
  identifier: string;
  /** Separates limits of different endpoints. */
  bucket: string;
  now?: number;
}

export function consumeRateLimit({
  identifier,
  bucket,
  windowMs,
  limit,
  now = Date.now(),
}: ConsumeRateLimitOptions): RateLimitResult {
  if (!identifier) {
    throw new Error("consumeRateLimit requires an identifier");
  }
  if (limit <= 0) {
    throw new Error("limit must be a positive integer");
  }
  if (windowMs <= 0) {
    throw new Error("windowMs must be a positive integer");
  }

  const bucketStore = getBucket(getGlobalStore(), bucket);
  pruneExpired(bucketStore, now, windowMs);
  const existing = bucketStore.get(identifier);

  if (!existing || existing.expiresAt <= now) {
    const expiresAt = now + windowMs;
    bucketStore.set(identifier, { count: 1, expiresAt });
    return buildResult({ allowed: true, count: 1, limit, now, expiresAt });
  }

  if (existing.count >= limit) {
    return buildResult({
      allowed: false,
      count: existing.count,
      limit,
      now,
      expiresAt: existing.expiresAt,
    });
  }

  existing.count += 1;
  return buildResult({
    allowed: true,
    count: existing.count,
    limit,
    now,
    expiresAt: existing.expiresAt,
  });
}

/**
 * Consumes one request for the caller and throws a 429 once the bucket is
 * exhausted. Returns the headers to attach to a successful response.
 */
export function enforceRateLimit(
  request: Request,
  options: RateLimitConfig & { bucket: string; message?: string; now?: number }
) {
  const result = consumeRateLimit({
    bucket: options.bucket,
    identifier: getRequestIdentifier(request),
    windowMs: options.windowMs,
    limit: options.limit,
    now: options.now,
  });

  if (!result.allowed) {
    throw new ApiErrorResponse(
      options.message ?? "Too many requests, please try again later.",
      429,
      `${options.bucket}_rate_limited`,
      { retryAfter: result.retryAfter },
      { exposeDetails: true, headers: result.headers }
    );
  }
  return result.headers;
}

interface BuildResultInput {
  allowed: boolean;
  count: number;
  limit: number;
  now: number;
  expiresAt: number;
}

function buildResult({ allowed, count, limit, now, expiresAt }: BuildResultInput): RateLimitResult {
  const remaining = Math.max(0, limit - count);
  const retryAfter = Math.ceil(Math.max(0, expiresAt - now) / 1000);

  const headers: Record<string, string> = {
    "RateLimit-Limit": `${limit}`,
    "RateLimit-Remaining": `${remaining}`,
    "RateLimit-Reset": `${Math.ceil(expiresAt / 1000)}`,
  };

  if (!allowed) {
    headers["Retry-After"] = `${retryAfter}`;
  }

  return {
    allowed,
    remaining,
    resetAt: expiresAt,
    retryAfter,
    headers,
  };
}

export function resolveRateLimitNumber(value: string | undefined, fallback: number) {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

export function getRequestIdentifier(request: Request) {
  const forwardedFor = request.headers.get("x-forwarded-for");
  if (forwardedFor) {
    const first = forwardedFor.split(",")[0]?.trim();
    if (first) {
      return first;
    }
  }

  const realIp = request.headers.get("x-real-ip");
  if (realIp) {
    return realIp;
  }

  const cfIp = request.headers.get("cf-connecting-ip");
  if (cfIp) {
    return cfIp;
  }

  return "anonymous";
}
