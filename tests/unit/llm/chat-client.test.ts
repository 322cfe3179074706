import type { JSONSchemaType } from "ajv";
import { describe, expect, it, vi } from "vitest";
import {
  ChatCompletionClient,
  ensureChatCompletionsPath,
  extractJsonContent,
  resolveBooleanEnv,
} from "@/lib/llm/chat-client";
import { LLMGenerationError } from "@/lib/llm/errors";

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

interface Answer {
  answer: string;
}

const answerSchema: JSONSchemaType<Answer> = {
  type: "object",
  additionalProperties: false,
  required: ["answer"],
  properties: {
    answer: { type: "string", minLength: 1 },
  },
};

function completion(content: string) {
  return new Response(
    JSON.stringify({
      id: "req-1",
      choices: [{ finish_reason: "stop", message: { role: "assistant", content } }],
      usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
    }),
    { status: 200, headers: { "Content-Type": "application/json" } }
  );
}

function createClient() {
  return new ChatCompletionClient({
    apiKey: "test-secret",
    baseUrl: "http://llm.test/v1/",
    model: "test-model",
    retryDelayMs: 0,
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

describe("ChatCompletionClient", () => {
  it("requires an API key", () => {
    vi.stubEnv("LLM_API_KEY", "");
    vi.stubEnv("OPENAI_API_KEY", "");

    let caught: unknown;
    try {
      new ChatCompletionClient();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(LLMGenerationError);
    expect(caught).toMatchObject({ kind: "config", status: 503, code: "llm_config" });
  });

  it("reads the endpoint and key from the environment", () => {
    vi.stubEnv("LLM_API_KEY", "test-secret");
    vi.stubEnv("LLM_API_BASE_URL", "http://llm.test/api/chat/completions/");
    expect(new ChatCompletionClient().chatEndpoint).toBe("http://llm.test/api/chat/completions");
  });

  it("posts a JSON schema request and returns the validated output", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => completion('```json\n{"answer":"Go in spring"}\n```'));
    vi.stubGlobal("fetch", fetchMock);

    const result = await createClient().generateStructuredJson({
      messages: [{ role: "user", content: "When should I visit?" }],
      schema: answerSchema,
      schemaName: "answer",
    });

    expect(result.output).toEqual({ answer: "Go in spring" });
    expect(result.attempts).toBe(1);
    expect(result.usage).toEqual({ requestId: "req-1", promptTokens: 12, completionTokens: 4, totalTokens: 16 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://llm.test/v1/chat/completions");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init.body))).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "When should I visit?" }],
      temperature: 0.6,
      response_format: {
        type: "json_schema",
        json_schema: { name: "answer", schema: answerSchema },
      },
    });
  });

  it("retries after an upstream error", async () => {
    const fetchMock = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response("overloaded", { status: 503 }))
      .mockResolvedValueOnce(completion('{"answer":"Pack layers"}'));
    vi.stubGlobal("fetch", fetchMock);

    const result = await createClient().generateStructuredJson({
      messages: [{ role: "user", content: "What to pack?" }],
      schema: answerSchema,
    });

    expect(result.output.answer).toBe("Pack layers");
    expect(result.attempts).toBe(2);
  });

  it("applies the payload transform before validating", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => completion('{"reply":"Try the night market"}')));

    const result = await createClient().generateStructuredJson({
      messages: [{ role: "user", content: "Food tips?" }],
      schema: answerSchema,
      transformPayload: (payload) =>
        typeof payload === "object" && payload !== null && "reply" in payload
          ? { answer: payload.reply }
          : payload,
    });

    expect(result.output).toEqual({ answer: "Try the night market" });
  });

  it("gives up with a validation error once retries run out", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const fetchMock = vi.fn(async () => completion('{"answer":""}'));
    vi.stubGlobal("fetch", fetchMock);

    const error = await captureError(
      createClient().generateStructuredJson({
        messages: [{ role: "user", content: "Hi" }],
        schema: answerSchema,
        maxRetries: 2,
      })
    );

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(LLMGenerationError);
    expect(error).toMatchObject({
      kind: "validation",
      attempt: 2,
      details: "/answer must NOT have fewer than 1 characters",
    });
  });

  it("reports unreadable JSON as a validation error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => completion("not json")));

    const error = await captureError(
      createClient().generateStructuredJson({
        messages: [{ role: "user", content: "Hi" }],
        schema: answerSchema,
        maxRetries: 1,
      })
    );
    expect(error).toMatchObject({ kind: "validation", message: "The LLM reply is not valid JSON." });
  });

  it("wraps network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    const error = await captureError(
      createClient().generateStructuredJson({
        messages: [{ role: "user", content: "Hi" }],
        schema: answerSchema,
        maxRetries: 1,
      })
    );
    expect(error).toMatchObject({ kind: "network", status: 502, code: "llm_network", attempt: 1 });
  });
});

describe("chat client helpers", () => {
  it("appends the completions path once", () => {
    expect(ensureChatCompletionsPath("https://example.test/v1")).toBe("https://example.test/v1/chat/completions");
    expect(ensureChatCompletionsPath("https://example.test/v1/chat/completions//")).toBe(
      "https://example.test/v1/chat/completions"
    );
  });

  it("joins text blocks from structured content", () => {
    expect(
      extractJsonContent({
        choices: [{ message: { role: "assistant", content: [{ type: "text", text: '{"a":' }, { content: "1}" }, {}] } }],
      })
    ).toBe('{"a":\n1}');
    expect(extractJsonContent({ choices: [] })).toBeNull();
  });

  it("parses boolean flags", () => {
    expect(resolveBooleanEnv(" Debug ")).toBe(true);
    expect(resolveBooleanEnv("0")).toBe(false);
    expect(resolveBooleanEnv(undefined)).toBe(false);
  });
});
