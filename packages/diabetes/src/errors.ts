/**
 * Result type and the domain error catalogue
 */

/**
 * Discriminated union for fallible domain operations.
 * Consumers narrow via `if (result.ok)` or `if (!result.ok)`.
 */
export type Result<T, E = DomainError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export type ErrorKind =
  | "InvalidInput"
  | "FutureTimestamp"
  | "NotFound"
  | "Forbidden"
  | "InvalidType"
  | "UpstreamFailure"
  | "InvalidRange"
  | "Cancelled";

export interface DomainError {
  readonly kind: ErrorKind;
  /** Stable machine-readable code, e.g. "InvalidCarbohydrate" */
  readonly code: string;
  readonly message: string;
  /** Original error for upstream failures */
  readonly cause?: unknown;
}

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E = DomainError>(error: E): Result<never, E> {
  return { ok: false, error };
}

function domainError(kind: ErrorKind, code: string, message: string): DomainError {
  const error: DomainError = { kind, code, message };
  return Object.freeze(error);
}

/**
 * Every error the core can return, grouped by concern
 */
export const DomainErrors = {
  invalidCarbohydrate: domainError(
    "InvalidInput",
    "InvalidCarbohydrate",
    "Carbohydrates must be a whole number between 0 and 300 grams."
  ),
  invalidInsulinDose: domainError(
    "InvalidInput",
    "InvalidInsulinDose",
    "Insulin dose must be between 0 and 100 units in 0.5 increments."
  ),
  invalidInsulinDetail: domainError(
    "InvalidInput",
    "InvalidInsulinDetail",
    "Insulin preparation, delivery and timing must be 200 characters or less."
  ),
  invalidExerciseDuration: domainError(
    "InvalidInput",
    "InvalidExerciseDuration",
    "Exercise duration must be a whole number between 1 and 300 minutes."
  ),
  invalidNoteText: domainError(
    "InvalidInput",
    "InvalidNoteText",
    "Note text must be between 1 and 500 characters."
  ),
  invalidTirRange: domainError(
    "InvalidInput",
    "InvalidTirRange",
    "TIR range lower bound must be less than upper bound, and both must be whole numbers between 0 and 1000."
  ),
  invalidUserId: domainError("InvalidInput", "InvalidUserId", "User ID cannot be empty."),
  invalidMealTagId: domainError(
    "InvalidInput",
    "InvalidMealTagId",
    "Meal tag ID must be a positive whole number."
  ),
  invalidExerciseTypeId: domainError(
    "InvalidInput",
    "InvalidExerciseTypeId",
    "Exercise type ID must be a positive whole number."
  ),
  invalidEventSnapshot: domainError(
    "InvalidInput",
    "InvalidEventSnapshot",
    "Stored event snapshot is malformed."
  ),
  invalidPaging: domainError(
    "InvalidInput",
    "InvalidPaging",
    "Page must be at least 1 and page size must be between 1 and 100."
  ),
  invalidDateRange: domainError(
    "InvalidInput",
    "InvalidDateRange",
    "From date must be before or equal to To date."
  ),
  invalidEventTime: domainError(
    "InvalidInput",
    "InvalidEventTime",
    "Event time must be a valid timestamp."
  ),
  eventTimeInFuture: domainError(
    "FutureTimestamp",
    "EventTimeInFuture",
    "Event time cannot be in the future."
  ),
  eventNotFound: domainError("NotFound", "EventNotFound", "Event not found."),
  forbidden: domainError("Forbidden", "AuthorizationForbidden", "User does not own this event."),
  eventInvalidType: domainError(
    "InvalidType",
    "EventInvalidType",
    "Event outcome is only available for food events."
  ),
  invalidRange: domainError(
    "InvalidRange",
    "InvalidRange",
    "Range must be one of: 1, 3, 5, 8, 12, 24 hours."
  ),
  cancelled: domainError("Cancelled", "Cancelled", "The operation was cancelled."),
} as const;

/**
 * Wrap an error thrown by a glucose source or event store.
 * The source's message and name are kept as-is.
 */
export function upstreamFailure(error: unknown): DomainError {
  const failure: DomainError =
    error instanceof Error
      ? { kind: "UpstreamFailure", code: error.name, message: error.message, cause: error }
      : { kind: "UpstreamFailure", code: "UpstreamFailure", message: String(error), cause: error };
  return Object.freeze(failure);
}
