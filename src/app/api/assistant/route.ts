import { NextRequest } from "next/server";
import { z } from "zod";
import { ok, handleApiError, parseJsonBody } from "@/lib/api-response";
import { ChatCompletionClient } from "@/lib/llm/chat-client";
import { TravelAssistant } from "@/lib/llm/travel-assistant";
import { enforceRateLimit, resolveRateLimitNumber } from "@/lib/rate-limit";

const LLM_RATE_LIMIT_WINDOW_MS = resolveRateLimitNumber(process.env.LLM_RATE_LIMIT_WINDOW_MS, 60_000);
const LLM_RATE_LIMIT_MAX = resolveRateLimitNumber(process.env.LLM_RATE_LIMIT_MAX, 10);

const assistantRequestSchema = z.object({
  question: z.string().trim().min(1, "Ask a question").max(1000),
  history: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string().max(4000),
      })
    )
    .max(20)
    .default([]),
  tripContext: z
    .object({
      origin: z.string().max(100).optional(),
      destination: z.string().max(100).optional(),
      startDate: z.string().optional(),
      endDate: z.string().optional(),
      budget: z.number().positive().optional(),
      travelers: z.number().int().positive().optional(),
      activities: z.array(z.string()).max(10).optional(),
    })
    .optional(),
});

export async function POST(request: NextRequest) {
  try {
    const rateLimitHeaders = enforceRateLimit(request, {
      bucket: "llm",
      windowMs: LLM_RATE_LIMIT_WINDOW_MS,
      limit: LLM_RATE_LIMIT_MAX,
      message: "The assistant is busy, please try again shortly.",
    });

    const { question, history, tripContext } = await parseJsonBody(request, assistantRequestSchema);
    const assistant = new TravelAssistant(new ChatCompletionClient());
    const reply = await assistant.ask({
      question,
      history,
      tripContext,
      signal: request.signal,
    });

    return ok(reply, { status: 200, headers: rateLimitHeaders });
  } catch (error) {
    return handleApiError(error);
  }
}
