import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  ApiErrorResponse,
  handleApiError,
  ok,
  parseJsonBody,
  parseSearchParams,
  toApiError,
} from "@/lib/api-response";
import { CatalogLookupError, PlanningError } from "@/lib/errors";
import { LLMGenerationError } from "@/lib/llm/errors";

function jsonRequest(body: string) {
  return new Request("http://localhost/api/test", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

async function captureError(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected the promise to reject");
}

describe("envelopes", () => {
  it("wraps data in a success envelope", async () => {
    const response = ok({ id: 1 }, { status: 201 });
    expect(response.status).toBe(201);
    expect(await response.json()).toEqual({ success: true, data: { id: 1 } });
  });

  it("renders known errors with their status and headers", async () => {
    const response = handleApiError(
      new ApiErrorResponse("Too many.", 429, "llm_rate_limited", { retryAfter: 5 }, {
        exposeDetails: true,
        headers: { "Retry-After": "5" },
      })
    );
    expect(response.status).toBe(429);
    expect(response.headers.get("Retry-After")).toBe("5");
    expect(await response.json()).toEqual({
      success: false,
      error: { message: "Too many.", code: "llm_rate_limited", details: { retryAfter: 5 } },
    });
  });

  it("hides unexposed details in production", async () => {
    vi.stubEnv("NODE_ENV", "production");
    const response = handleApiError(new ApiErrorResponse("Could not save.", 500, "db_error", { table: "x" }));
    expect(await response.json()).toEqual({
      success: false,
      error: { message: "Could not save.", code: "db_error" },
    });
  });

  it("turns unknown errors into a generic 500", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const response = handleApiError(new Error("boom"));
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      success: false,
      error: { message: "Internal server error, please try again later." },
    });
  });
});

describe("toApiError", () => {
  it("maps domain errors onto HTTP statuses", () => {
    expect(toApiError(new PlanningError("invalid_dates", "Bad dates"))).toMatchObject({
      status: 422,
      code: "invalid_dates",
      exposeDetails: true,
    });
    expect(toApiError(new CatalogLookupError("destination_not_found", "Unknown"))).toMatchObject({
      status: 404,
      code: "destination_not_found",
    });
    expect(toApiError(new CatalogLookupError("invalid_catalog_data", "Broken"))).toMatchObject({ status: 500 });
    expect(toApiError(new LLMGenerationError("config", "No key"))).toMatchObject({
      status: 503,
      code: "llm_config",
    });
    expect(toApiError(new LLMGenerationError("network", "Down"))).toMatchObject({
      status: 502,
      code: "llm_network",
    });
    expect(toApiError(new Error("other"))).toBeNull();
  });
});

describe("parseJsonBody", () => {
  const schema = z.object({ name: z.string().min(1), count: z.number().int().default(1) });

  it("returns the parsed body with defaults", async () => {
    await expect(parseJsonBody(jsonRequest('{"name":"Rome"}'), schema)).resolves.toEqual({ name: "Rome", count: 1 });
  });

  it("rejects malformed JSON", async () => {
    const error = await captureError(parseJsonBody(jsonRequest("{"), schema));
    expect(error).toMatchObject({ status: 422, code: "invalid_body", message: "Request body must be valid JSON." });
  });

  it("exposes field errors for invalid bodies", async () => {
    const error = await captureError(parseJsonBody(jsonRequest('{"name":""}'), schema));
    expect(error).toBeInstanceOf(ApiErrorResponse);
    expect(error).toMatchObject({ status: 422, code: "invalid_body", exposeDetails: true });
    if (error instanceof ApiErrorResponse) {
      expect(error.details).toEqual({
        formErrors: [],
        fieldErrors: { name: ["String must contain at least 1 character(s)"] },
      });
    }
  });
});

describe("parseSearchParams", () => {
  const schema = z.object({
    tag: z.union([z.string(), z.array(z.string())]).optional(),
    limit: z.string().optional(),
  });

  it("collects repeated keys into arrays", () => {
    expect(parseSearchParams(new URLSearchParams("tag=a&tag=b&limit=5"), schema)).toEqual({
      tag: ["a", "b"],
      limit: "5",
    });
  });

  it("throws a 422 for invalid queries", () => {
    expect(() => parseSearchParams(new URLSearchParams("limit=1&limit=2"), schema)).toThrow(
      "Invalid query parameters."
    );
  });
});
