import { NextResponse } from "next/server";
import type { ZodType, ZodTypeDef } from "zod";
import { CatalogLookupError, PlanningError } from "@/lib/errors";
import { LLMGenerationError } from "@/lib/llm/errors";

interface ApiSuccess<T> {
  success: true;
  data: T;
}

interface ApiError {
  success: false;
  error: {
    message: string;
    code?: string;
    details?: unknown;
  };
}

export type ApiResult<T> = ApiSuccess<T> | ApiError;

export function ok<T>(data: T, init?: ResponseInit) {
  return NextResponse.json<ApiSuccess<T>>(
    {
      success: true,
      data,
    },
    init ?? { status: 200 }
  );
}

export function fail(message: string, init?: ResponseInit & { code?: string; details?: unknown }) {
  const { code, details, status, headers } = init ?? {};
  return NextResponse.json<ApiError>(
    {
      success: false,
      error: {
        message,
        code,
        details,
      },
    },
    {
      status: status ?? 400,
      headers,
    }
  );
}

export class ApiErrorResponse extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly details?: unknown;
  public readonly exposeDetails: boolean;
  public readonly headers?: HeadersInit;

  constructor(
    message: string,
    status = 400,
    code?: string,
    details?: unknown,
    options?: {
      exposeDetails?: boolean;
      headers?: HeadersInit;
    }
  ) {
    super(message);
    this.name = "ApiErrorResponse";
    this.status = status;
    this.code = code;
    this.details = details;
    this.exposeDetails = options?.exposeDetails ?? false;
    this.headers = options?.headers;
  }
}

/**
 * Maps domain errors onto HTTP errors. Anything unknown is left alone and
 * ends up as a 500.
 */
export function toApiError(error: unknown): ApiErrorResponse | null {
  if (error instanceof ApiErrorResponse) {
    return error;
  }
  if (error instanceof PlanningError) {
    return new ApiErrorResponse(error.message, 422, error.kind, error.details, {
      exposeDetails: true,
    });
  }
  if (error instanceof CatalogLookupError) {
    const status = error.kind === "invalid_catalog_data" ? 500 : 404;
    return new ApiErrorResponse(error.message, status, error.kind);
  }
  if (error instanceof LLMGenerationError) {
    return new ApiErrorResponse(error.message, error.status, error.code, error.details);
  }
  return null;
}

export function handleApiError(error: unknown) {
  const apiError = toApiError(error);
  if (apiError) {
    const shouldExposeDetails = apiError.exposeDetails || process.env.NODE_ENV !== "production";
    const details = shouldExposeDetails ? apiError.details : undefined;
    return fail(apiError.message, {
      status: apiError.status,
      code: apiError.code,
      details,
      headers: apiError.headers,
    });
  }

  console.error("[API] Unhandled error:", error);
  return fail("Internal server error, please try again later.", {
    status: 500,
  });
}

export async function parseJsonBody<Output, Input = Output>(
  request: Request,
  schema: ZodType<Output, ZodTypeDef, Input>
): Promise<Output> {
  let payload: unknown;
  try {
    payload = await request.json();
  } catch (error) {
    throw new ApiErrorResponse("Request body must be valid JSON.", 422, "invalid_body", error);
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ApiErrorResponse("Invalid request body.", 422, "invalid_body", parsed.error.flatten(), {
      exposeDetails: true,
    });
  }
  return parsed.data;
}

export function parseSearchParams<Output, Input = Output>(
  searchParams: URLSearchParams,
  schema: ZodType<Output, ZodTypeDef, Input>
): Output {
  const raw: Record<string, string | string[]> = {};
  for (const key of new Set(searchParams.keys())) {
    const values = searchParams.getAll(key);
    raw[key] = values.length > 1 ? values : values[0];
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ApiErrorResponse("Invalid query parameters.", 422, "invalid_query", parsed.error.flatten(), {
      exposeDetails: true,
    });
  }
  return parsed.data;
}
