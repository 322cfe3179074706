export type LLMMessageRole = "system" | "user" | "assistant";

export interface LLMMessage {
  role: LLMMessageRole;
  content: string;
}

export interface LLMGenerationUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
  requestId?: string;
}

export interface LLMStructuredGenerationResult<T> {
  output: T;
  raw: unknown;
  attempts: number;
  usage?: LLMGenerationUsage;
}

export interface AssistantAnswer {
  answer: string;
  suggestedDestinations?: string[];
  followUpQuestions?: string[];
}

/** Trip the user is currently planning, sent along with the question. */
export interface AssistantTripContext {
  origin?: string;
  destination?: string;
  startDate?: string;
  endDate?: string;
  budget?: number;
  travelers?: number;
  activities?: string[];
}

export interface AssistantDestinationSummary {
  name: string;
  region: string;
  climate: string;
  avgDailyCost: number;
  bestSeasons: string[];
  description: string;
}

export interface AssistantPromptContext {
  question: string;
  history: Array<{ role: Exclude<LLMMessageRole, "system">; content: string }>;
  tripContext?: AssistantTripContext;
  destinations: AssistantDestinationSummary[];
}
