import type { JSONSchemaType } from "ajv";
import { describe, expect, it } from "vitest";
import { matchDestinations, normalizeAssistantAnswerPayload, toAssistantAnswer } from "@/lib/llm/normalize";
import { buildAssistantPromptMessages } from "@/lib/llm/prompts";
import { formatAjvErrors, validateWithSchema } from "@/lib/llm/validator";

const known = ["Paris, France", "Tokyo, Japan"];

describe("normalizeAssistantAnswerPayload", () => {
  it("wraps a plain string reply", () => {
    expect(normalizeAssistantAnswerPayload("  Visit in spring. ", known)).toEqual({ answer: "Visit in spring." });
    expect(normalizeAssistantAnswerPayload("   ", known)).toBe("   ");
  });

  it("accepts alternative field names", () => {
    expect(
      normalizeAssistantAnswerPayload(
        { message: 42, suggested_destinations: ["tokyo", " ", "Paris, France", "Paris"], followUps: "A?\nB?;C?;D?" },
        known
      )
    ).toEqual({
      answer: "42",
      suggestedDestinations: ["Tokyo, Japan", "Paris, France"],
      followUpQuestions: ["A?", "B?", "C?"],
    });
  });

  it("leaves arrays and other values alone", () => {
    expect(normalizeAssistantAnswerPayload(["a"], known)).toEqual(["a"]);
    expect(normalizeAssistantAnswerPayload(null, known)).toBeNull();
  });
});

describe("matchDestinations", () => {
  it("matches full names and city names without duplicates", () => {
    expect(matchDestinations(["PARIS", "paris, france", "Lyon"], known)).toEqual(["Paris, France"]);
  });
});

describe("toAssistantAnswer", () => {
  it("fills optional lists", () => {
    expect(toAssistantAnswer({ answer: "Hi" })).toEqual({
      answer: "Hi",
      suggestedDestinations: [],
      followUpQuestions: [],
    });
  });
});

interface Budget {
  amount: number;
  currency: string;
}

const budgetSchema: JSONSchemaType<Budget> = {
  type: "object",
  additionalProperties: false,
  required: ["amount", "currency"],
  properties: {
    amount: { type: "number", minimum: 0 },
    currency: { type: "string", minLength: 3, maxLength: 3 },
  },
};

describe("validateWithSchema", () => {
  it("coerces types and strips unknown properties", () => {
    expect(validateWithSchema(budgetSchema, { amount: "120", currency: "EUR", note: "extra" })).toEqual({
      success: true,
      data: { amount: 120, currency: "EUR" },
    });
  });

  it("collects every error", () => {
    const result = validateWithSchema(budgetSchema, { amount: -1 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect([...result.errors].sort()).toEqual([
        "/amount must be >= 0",
        "required must have required property 'currency'",
      ]);
    }
  });

  it("formats an empty error list", () => {
    expect(formatAjvErrors(null)).toEqual([]);
  });
});

describe("buildAssistantPromptMessages", () => {
  it("describes a missing trip", () => {
    const [system, question] = buildAssistantPromptMessages({
      question: "Hi",
      history: [],
      destinations: [],
    });
    expect(system.content).toContain("Current trip:\nThe user has not started planning a specific trip yet.");
    expect(question).toEqual({ role: "user", content: "Hi" });
  });

  it("notes an empty trip context", () => {
    const [system] = buildAssistantPromptMessages({
      question: "Hi",
      history: [],
      tripContext: {},
      destinations: [],
    });
    expect(system.content).toContain("Current trip:\nThe user has not shared trip details yet.");
  });
});
