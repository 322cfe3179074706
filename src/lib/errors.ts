export type PlanningErrorKind =
  | "invalid_dates"
  | "missing_activities"
  | "invalid_budget"
  | "unknown_destination"
  | "invalid_window";

export class PlanningError extends Error {
  public readonly kind: PlanningErrorKind;
  public readonly details?: unknown;

  constructor(kind: PlanningErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = "PlanningError";
    this.kind = kind;
    this.details = details;
  }
}

export type CatalogLookupErrorKind =
  | "destination_not_found"
  | "transportation_not_found"
  | "invalid_catalog_data";

export class CatalogLookupError extends Error {
  public readonly kind: CatalogLookupErrorKind;

  constructor(kind: CatalogLookupErrorKind, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "CatalogLookupError";
    this.kind = kind;
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
