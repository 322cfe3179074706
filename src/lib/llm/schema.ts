import type { JSONSchemaType } from "ajv";
import type { AssistantAnswer } from "./types";

export const MAX_FOLLOW_UP_QUESTIONS = 3;

export const assistantAnswerSchema: JSONSchemaType<AssistantAnswer> = {
  $id: "ai-travel-buddy://schemas/assistant-answer.json",
  type: "object",
  additionalProperties: false,
  required: ["answer"],
  properties: {
    answer: { type: "string", minLength: 1 },
    suggestedDestinations: {
      type: "array",
      nullable: true,
      items: { type: "string", minLength: 1 },
    },
    followUpQuestions: {
      type: "array",
      nullable: true,
      maxItems: MAX_FOLLOW_UP_QUESTIONS,
      items: { type: "string", minLength: 1 },
    },
  },
};
