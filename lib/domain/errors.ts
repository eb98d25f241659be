import type { BookingStatus } from "./types";

export type BookingDeskErrorKind = "validation" | "reference" | "not_found" | "invalid_transition" | "storage";

export abstract class BookingDeskError extends Error {
  abstract readonly kind: BookingDeskErrorKind;
  readonly code: string;

  protected constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export type ValidationDetails = Record<string, string[] | undefined>;

export class ValidationError extends BookingDeskError {
  readonly kind = "validation";
  readonly details?: ValidationDetails;

  constructor(code: string, message: string, details?: ValidationDetails) {
    super(code, message);
    this.details = details;
  }
}

/**
 * A referenced provider does not exist. Callers treat it like a validation
 * failure; it is a separate class so HTTP layers can map it to its own status.
 */
export class ReferenceError extends BookingDeskError {
  readonly kind = "reference";

  constructor(code: string, message: string) {
    super(code, message);
  }
}

export { ReferenceError as ProviderReferenceError };

export class NotFoundError extends BookingDeskError {
  readonly kind = "not_found";
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string) {
    super(`${entity.toUpperCase()}_NOT_FOUND`, `${entity} ${id} not found`);
    this.entity = entity;
    this.id = id;
  }
}

export class InvalidTransitionError extends BookingDeskError {
  readonly kind = "invalid_transition";
  readonly from: BookingStatus;
  readonly to: BookingStatus;

  constructor(from: BookingStatus, to: BookingStatus) {
    super("INVALID_TRANSITION", `cannot move booking from ${from} to ${to}`);
    this.from = from;
    this.to = to;
  }
}

export class StorageFailureError extends BookingDeskError {
  readonly kind = "storage";
  readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_FAILURE", message);
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

export function isBookingDeskError(value: unknown): value is BookingDeskError {
  return value instanceof BookingDeskError;
}
