import { beforeEach, describe, expect, it, vi } from "vitest";
import { POST as askAssistant } from "@/app/api/assistant/route";
import { resetRateLimits } from "@/lib/rate-limit";
import { jsonRequest } from "../utils/requests";

function completion(content: unknown) {
  return new Response(
    JSON.stringify({ id: "req-7", choices: [{ message: { role: "assistant", content: JSON.stringify(content) } }] }),
    { status: 200 }
  );
}

describe("POST /api/assistant", () => {
  beforeEach(() => {
    resetRateLimits();
    vi.stubEnv("LLM_API_KEY", "test-secret");
    vi.stubEnv("LLM_API_BASE_URL", "http://llm.test/v1");
  });

  it("answers with catalog suggestions", async () => {
    const fetchMock = vi.fn(async () =>
      completion({
        answer: "Rome is lovely in spring.",
        suggestedDestinations: ["Rome", "Atlantis"],
        followUpQuestions: ["Which museums?"],
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await askAssistant(
      jsonRequest("/api/assistant", {
        question: "Where should I go in April?",
        tripContext: { budget: 2000, activities: ["Cultural & Historical"] },
      })
    );
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(response.headers.get("RateLimit-Limit")).toBe("10");
    expect(body.data).toEqual({
      answer: "Rome is lovely in spring.",
      suggestedDestinations: ["Rome, Italy"],
      followUpQuestions: ["Which museums?"],
      attempts: 1,
      usage: { requestId: "req-7" },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports a missing API key as unavailable", async () => {
    vi.stubEnv("LLM_API_KEY", "");
    vi.stubEnv("OPENAI_API_KEY", "");

    const response = await askAssistant(jsonRequest("/api/assistant", { question: "Hi" }));
    expect(response.status).toBe(503);
    expect((await response.json()).error.code).toBe("llm_config");
  });

  it("validates the question", async () => {
    const response = await askAssistant(jsonRequest("/api/assistant", { question: "   " }));
    expect(response.status).toBe(422);
  });
});
