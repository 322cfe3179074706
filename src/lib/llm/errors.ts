export type LLMGenerationErrorKind = "config" | "network" | "validation" | "unexpected";

interface GenerationErrorOptions {
  cause?: unknown;
  details?: string;
  attempt?: number;
}

export class LLMGenerationError extends Error {
  public readonly kind: LLMGenerationErrorKind;
  public readonly details?: string;
  public readonly attempt?: number;

  constructor(kind: LLMGenerationErrorKind, message: string, options?: GenerationErrorOptions) {
    super(message);
    this.name = "LLMGenerationError";
    this.kind = kind;
    this.details = options?.details;
    this.attempt = options?.attempt;
    if (options?.cause) {
      this.cause = options.cause;
    }
  }

  /** Error code reported to API clients, e.g. `llm_network`. */
  get code() {
    return `llm_${this.kind}`;
  }

  /** Missing configuration is our problem; everything else is upstream. */
  get status() {
    return this.kind === "config" ? 503 : 502;
  }
}
