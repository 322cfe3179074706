import type { AssistantPromptContext, AssistantTripContext, LLMMessage } from "./types";
import { MAX_FOLLOW_UP_QUESTIONS } from "./schema";

export const MAX_HISTORY_TURNS = 8;

function formatTripContext(trip?: AssistantTripContext) {
  if (!trip) {
    return "The user has not started planning a specific trip yet.";
  }

  const lines = [
    trip.destination ? `- Destination: ${trip.destination}` : null,
    trip.origin ? `- Departing from: ${trip.origin}` : null,
    trip.startDate && trip.endDate ? `- Dates: ${trip.startDate} to ${trip.endDate}` : null,
    typeof trip.budget === "number" ? `- Budget: ${trip.budget.toFixed(0)} USD for the whole trip` : null,
    trip.travelers ? `- Travelers: ${trip.travelers}` : null,
    trip.activities?.length ? `- Interests: ${trip.activities.join(", ")}` : null,
  ].filter((line): line is string => line !== null);

  return lines.length > 0 ? lines.join("\n") : "The user has not shared trip details yet.";
}

function formatDestinations(destinations: AssistantPromptContext["destinations"]) {
  return destinations
    .map(
      (destination) =>
        `- ${destination.name} (${destination.region}, ${destination.climate}, about $${destination.avgDailyCost}/day, best: ${destination.bestSeasons.join(", ")}): ${destination.description}`
    )
    .join("\n");
}

const systemPrompt = `You are AI Travel Buddy, a friendly and practical travel planning assistant.
Always:
1. Answer the user's travel question directly and concisely (at most three short paragraphs);
2. Prefer the destinations listed below when recommending places, and use their exact names;
3. Give realistic cost estimates in USD and mention assumptions when information is missing;
4. Reply with JSON only, matching the provided schema. No Markdown fences or extra text.`;

export function buildAssistantPromptMessages(context: AssistantPromptContext): LLMMessage[] {
  const knowledge = `Destinations we have detailed travel data for:
${formatDestinations(context.destinations)}

Current trip:
${formatTripContext(context.tripContext)}

Output rules:
- \`answer\`: your reply to the user;
- \`suggestedDestinations\`: optional, names from the list above that fit the question;
- \`followUpQuestions\`: optional, at most ${MAX_FOLLOW_UP_QUESTIONS} short questions the user might ask next.`;

  const history = context.history.slice(-MAX_HISTORY_TURNS).map((turn) => ({
    role: turn.role,
    content: turn.content,
  }));

  return [
    { role: "system", content: `${systemPrompt}\n\n${knowledge}` },
    ...history,
    { role: "user", content: context.question },
  ];
}
