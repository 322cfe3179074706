import { getDefaultCatalog, type TravelCatalog } from "@/lib/catalog";
import { ChatCompletionClient } from "./chat-client";
import { normalizeAssistantAnswerPayload, toAssistantAnswer } from "./normalize";
import { buildAssistantPromptMessages } from "./prompts";
import { assistantAnswerSchema } from "./schema";
import type {
  AssistantAnswer,
  AssistantPromptContext,
  AssistantTripContext,
  LLMGenerationUsage,
} from "./types";

export interface AskAssistantInput {
  question: string;
  history?: AssistantPromptContext["history"];
  tripContext?: AssistantTripContext;
  signal?: AbortSignal;
}

export interface AssistantReply extends Required<AssistantAnswer> {
  attempts: number;
  usage?: LLMGenerationUsage;
}

/**
 * Natural-language travel Q&A grounded on the destination catalog.
 */
export class TravelAssistant {
  constructor(
    private readonly client: Pick<ChatCompletionClient, "generateStructuredJson">,
    private readonly catalog: TravelCatalog = getDefaultCatalog()
  ) {}

  async ask(input: AskAssistantInput): Promise<AssistantReply> {
    const destinations = this.catalog.listDestinations();
    const names = destinations.map((destination) => destination.name);

    const messages = buildAssistantPromptMessages({
      question: input.question.trim(),
      history: input.history ?? [],
      tripContext: input.tripContext,
      destinations: destinations.map((destination) => ({
        name: destination.name,
        region: destination.region,
        climate: destination.climate,
        avgDailyCost: destination.avgDailyCost,
        bestSeasons: destination.bestSeasons,
        description: destination.description,
      })),
    });

    const result = await this.client.generateStructuredJson({
      messages,
      schema: assistantAnswerSchema,
      schemaName: "travel_assistant_answer",
      signal: input.signal,
      transformPayload: (payload) => normalizeAssistantAnswerPayload(payload, names),
    });

    return {
      ...toAssistantAnswer(result.output),
      attempts: result.attempts,
      usage: result.usage,
    };
  }
}
