import { NextRequest } from "next/server";
import { z } from "zod";
import { ok, handleApiError, parseJsonBody } from "@/lib/api-response";
import { collectMissingFields, parseTripIntent } from "@/lib/trip-intent/parser";

const createIntentSchema = z.object({
  rawInput: z
    .string()
    .trim()
    .min(4, "Description is too short to parse")
    .max(800, "Description is too long"),
  source: z.enum(["text", "chat"]).default("text"),
});

export async function POST(request: NextRequest) {
  try {
    const { rawInput, source } = await parseJsonBody(request, createIntentSchema);
    const intent = parseTripIntent(rawInput, { source });

    return ok({ intent, missingFields: collectMissingFields(intent) });
  } catch (error) {
    return handleApiError(error);
  }
}
