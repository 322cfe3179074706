import type { ApiResult } from "@/lib/api-response";

export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly details?: unknown;

  constructor(message: string, status: number, code?: string, details?: unknown) {
    super(message);
    this.name = "ApiRequestError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

interface ApiRequestOptions {
  method?: "GET" | "POST" | "DELETE";
  body?: unknown;
  token?: string | null;
  signal?: AbortSignal;
}

/**
 * Calls one of our JSON routes and unwraps the `{ success, data }` envelope.
 */
export async function apiRequest<T>(path: string, options: ApiRequestOptions = {}): Promise<T> {
  const headers: Record<string, string> = {};
  if (options.body !== undefined) {
    headers["Content-Type"] = "application/json";
  }
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }

  const response = await fetch(path, {
    method: options.method ?? (options.body === undefined ? "GET" : "POST"),
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
    signal: options.signal,
    cache: "no-store",
  });

  let payload: ApiResult<T> | null = null;
  try {
    payload = await response.json();
  } catch {
    payload = null;
  }

  if (!payload) {
    throw new ApiRequestError(`Request failed with status ${response.status}.`, response.status);
  }
  if (!payload.success) {
    throw new ApiRequestError(
      payload.error.message,
      response.status,
      payload.error.code,
      payload.error.details
    );
  }
  return payload.data;
}

export function describeError(error: unknown, fallback: string) {
  return error instanceof Error && error.message ? error.message : fallback;
}
