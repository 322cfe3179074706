import type { JSONSchemaType } from "ajv";
import type { LLMMessage, LLMStructuredGenerationResult } from "./types";
import { LLMGenerationError } from "./errors";
import { validateWithSchema } from "./validator";

export interface ChatCompletionClientOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxRetries?: number;
  /** Base back-off between attempts, multiplied by the attempt number. */
  retryDelayMs?: number;
}

export interface StructuredGenerationOptions<T> {
  messages: LLMMessage[];
  schema: JSONSchemaType<T>;
  temperature?: number;
  maxRetries?: number;
  signal?: AbortSignal;
  schemaName?: string;
  transformPayload?: (payload: unknown) => unknown;
}

interface ChatMessageContentBlock {
  type?: string;
  text?: string;
  content?: string;
}

type ChatMessageContent = string | ChatMessageContentBlock[];

interface ChatCompletionChoice {
  finish_reason?: string;
  message?: {
    role: string;
    content?: ChatMessageContent | null;
  };
}

interface ChatCompletionResponse {
  id?: string;
  choices?: ChatCompletionChoice[];
  usage?: {
    total_tokens?: number;
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}

export const DEFAULT_LLM_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_LLM_MODEL = "gpt-4o-mini";
const DEFAULT_SCHEMA_NAME = "structured_output";
const DEBUG_SAMPLE_LIMIT = 600;
const LLM_DEBUG_STRUCTURED_OUTPUT = resolveBooleanEnv(process.env.LLM_DEBUG_STRUCTURED_OUTPUT);

/**
 * Client for OpenAI-compatible `/chat/completions` endpoints that asks for
 * JSON matching a schema and retries until the reply validates.
 */
export class ChatCompletionClient {
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly model: string;
  private readonly defaultTemperature: number;
  private readonly defaultMaxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options?: ChatCompletionClientOptions) {
    const apiKey = (options?.apiKey ?? process.env.LLM_API_KEY ?? process.env.OPENAI_API_KEY)?.trim();

    if (!apiKey) {
      throw new LLMGenerationError("config", "Missing LLM API key (LLM_API_KEY or OPENAI_API_KEY).");
    }

    this.apiKey = apiKey;
    this.endpoint = ensureChatCompletionsPath(
      options?.baseUrl?.trim() || process.env.LLM_API_BASE_URL?.trim() || DEFAULT_LLM_BASE_URL
    );
    this.model = options?.model ?? (process.env.LLM_MODEL?.trim() || DEFAULT_LLM_MODEL);
    this.defaultTemperature = options?.temperature ?? 0.6;
    this.defaultMaxRetries = options?.maxRetries ?? 3;
    this.retryDelayMs = options?.retryDelayMs ?? 400;
  }

  get chatEndpoint() {
    return this.endpoint;
  }

  async generateStructuredJson<T>(
    options: StructuredGenerationOptions<T>
  ): Promise<LLMStructuredGenerationResult<T>> {
    const maxRetries = options.maxRetries ?? this.defaultMaxRetries;
    let attempt = 0;
    let lastError: LLMGenerationError | null = null;

    while (attempt < maxRetries) {
      attempt += 1;
      try {
        const response = await this.invoke(options, attempt);
        emitLLMDebugLog("raw_llm_payload", {
          attempt,
          parsed: safeSamplePayload(response.parsed),
          usage: response.usage,
        });

        const transformedPayload = options.transformPayload
          ? options.transformPayload(response.parsed)
          : response.parsed;
        emitLLMDebugLog("normalized_llm_payload", {
          attempt,
          payload: safeSamplePayload(transformedPayload),
        });

        const validated = validateWithSchema(options.schema, transformedPayload);
        if (!validated.success) {
          if (process.env.NODE_ENV !== "production") {
            console.warn("[LLM] Structured payload validation failed", {
              attempt,
              errors: validated.errors,
              payloadSample: safeSamplePayload(transformedPayload),
            });
          }
          throw new LLMGenerationError(
            "validation",
            `Attempt ${attempt} returned content that does not match the JSON schema.`,
            {
              attempt,
              details: validated.errors.join("; "),
            }
          );
        }

        return {
          output: validated.data,
          raw: response.raw,
          attempts: attempt,
          usage: response.usage,
        };
      } catch (error) {
        if (error instanceof LLMGenerationError) {
          lastError = error;
        } else {
          lastError = new LLMGenerationError("unexpected", "Unexpected error while calling the LLM.", {
            cause: error,
            attempt,
          });
        }

        if (attempt >= maxRetries || options.signal?.aborted) {
          break;
        }

        await delay(attempt * this.retryDelayMs);
      }
    }

    throw lastError ?? new LLMGenerationError("unexpected", "The LLM call failed without an error.");
  }

  private async invoke<T>(options: StructuredGenerationOptions<T>, attempt: number) {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(this.buildRequestPayload(options)),
        signal: options.signal,
      });
    } catch (error) {
      throw new LLMGenerationError("network", "Could not reach the LLM service.", {
        attempt,
        cause: error,
      });
    }

    if (!response.ok) {
      const errorText = await safeReadText(response);
      throw new LLMGenerationError("network", `The LLM service responded with ${response.status}.`, {
        attempt,
        details: errorText,
      });
    }

    let rawResponse: ChatCompletionResponse;
    try {
      rawResponse = await response.json();
    } catch (error) {
      throw new LLMGenerationError("unexpected", "The LLM service returned an unreadable response.", {
        attempt,
        cause: error,
      });
    }

    const jsonPayload = extractJsonContent(rawResponse);
    let parsedJson: unknown;
    try {
      parsedJson = jsonPayload ? JSON.parse(stripCodeFence(jsonPayload)) : null;
    } catch (error) {
      throw new LLMGenerationError("validation", "The LLM reply is not valid JSON.", {
        attempt,
        cause: error,
      });
    }

    return {
      raw: rawResponse,
      parsed: parsedJson,
      usage: {
        requestId: rawResponse.id,
        promptTokens: rawResponse.usage?.prompt_tokens,
        completionTokens: rawResponse.usage?.completion_tokens,
        totalTokens: rawResponse.usage?.total_tokens,
      },
    };
  }

  private buildRequestPayload<T>(options: StructuredGenerationOptions<T>) {
    return {
      model: this.model,
      messages: options.messages,
      temperature: options.temperature ?? this.defaultTemperature,
      response_format: {
        type: "json_schema",
        json_schema: {
          name: options.schemaName ?? DEFAULT_SCHEMA_NAME,
          schema: options.schema,
        },
      },
    };
  }
}

export function extractJsonContent(response: ChatCompletionResponse | undefined) {
  const messageContent = response?.choices?.[0]?.message?.content;
  if (!messageContent) {
    return null;
  }

  if (typeof messageContent === "string") {
    return messageContent.trim();
  }

  const combined = messageContent
    .map((item) => {
      if (typeof item.text === "string") return item.text;
      if (typeof item.content === "string") return item.content;
      return "";
    })
    .filter(Boolean)
    .join("\n")
    .trim();

  return combined || null;
}

export function ensureChatCompletionsPath(base: string) {
  const trimmed = base.replace(/\/+$/, "");
  if (trimmed.toLowerCase().endsWith("/chat/completions")) {
    return trimmed;
  }
  return `${trimmed}/chat/completions`;
}

function stripCodeFence(value: string) {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(value);
  return fenced ? fenced[1] : value;
}

function safeSamplePayload(payload: unknown) {
  try {
    return JSON.parse(
      JSON.stringify(payload, (_key, value) => {
        if (typeof value === "string" && value.length > DEBUG_SAMPLE_LIMIT) {
          return `${value.slice(0, DEBUG_SAMPLE_LIMIT)}…`;
        }
        return value;
      })
    );
  } catch {
    return "[unserializable payload]";
  }
}

function emitLLMDebugLog(event: string, payload: unknown) {
  if (!LLM_DEBUG_STRUCTURED_OUTPUT) {
    return;
  }
  console.debug(`[LLM][debug] ${event}`, payload);
}

export function resolveBooleanEnv(value?: string | null) {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return ["1", "true", "yes", "debug", "on"].includes(normalized);
}

async function safeReadText(response: Response) {
  try {
    return await response.text();
  } catch {
    return "unknown error";
  }
}

function delay(duration: number) {
  return new Promise((resolve) => {
    setTimeout(resolve, duration);
  });
}
