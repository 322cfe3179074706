import { MAX_FOLLOW_UP_QUESTIONS } from "./schema";
import type { AssistantAnswer } from "./types";

type AnyRecord = Record<string, unknown>;

/**
 * Brings a loosely shaped model reply into the assistant answer shape before
 * schema validation. Unknown destination names are dropped.
 */
export function normalizeAssistantAnswerPayload(payload: unknown, knownDestinations: string[]) {
  if (typeof payload === "string") {
    const answer = normalizeString(payload);
    return answer ? { answer } : payload;
  }
  if (!isRecord(payload)) {
    return payload;
  }

  const answer =
    normalizeString(payload.answer) ??
    normalizeString(payload.reply) ??
    normalizeString(payload.response) ??
    normalizeString(payload.message);

  const normalized: AnyRecord = {};
  if (answer) {
    normalized.answer = answer;
  }

  const destinations = normalizeStringList(
    payload.suggestedDestinations ?? payload.suggested_destinations ?? payload.destinations
  );
  if (destinations) {
    normalized.suggestedDestinations = matchDestinations(destinations, knownDestinations);
  }

  const followUps = normalizeStringList(
    payload.followUpQuestions ?? payload.follow_up_questions ?? payload.followUps
  );
  if (followUps) {
    normalized.followUpQuestions = followUps.slice(0, MAX_FOLLOW_UP_QUESTIONS);
  }

  return normalized;
}

export function matchDestinations(candidates: string[], knownDestinations: string[]) {
  const matched: string[] = [];
  for (const candidate of candidates) {
    const needle = candidate.toLowerCase();
    const name = knownDestinations.find((known) => {
      const full = known.toLowerCase();
      const city = full.split(",")[0].trim();
      return full === needle || city === needle;
    });
    if (name && !matched.includes(name)) {
      matched.push(name);
    }
  }
  return matched;
}

export function toAssistantAnswer(value: AssistantAnswer): Required<AssistantAnswer> {
  return {
    answer: value.answer,
    suggestedDestinations: value.suggestedDestinations ?? [],
    followUpQuestions: value.followUpQuestions ?? [],
  };
}

function normalizeStringList(value: unknown): string[] | undefined {
  if (Array.isArray(value)) {
    return value
      .map((item) => normalizeString(item))
      .filter((item): item is string => !!item);
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      return [];
    }
    return trimmed
      .split(/[\n;]+/)
      .map((item) => item.trim())
      .filter(Boolean);
  }

  return undefined;
}

function normalizeString(value: unknown) {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return value.toString();
  }
  return undefined;
}

function isRecord(value: unknown): value is AnyRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
