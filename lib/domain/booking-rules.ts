import { isAfter } from "date-fns";
import { ValidationError } from "./errors";
import type { Provider } from "./types";

type RequiredFields = Record<string, string | undefined>;

/**
 * Every provided value must be non-empty. Keys whose value is undefined were
 * not supplied (partial updates) and are skipped.
 */
export function assertRequiredFields(fields: RequiredFields): void {
  for (const [label, value] of Object.entries(fields)) {
    if (value !== undefined && value.trim().length === 0) {
      throw new ValidationError("REQUIRED_FIELD", `${label} cannot be empty`);
    }
  }
}

export function assertProviderFields(fields: { name?: string; sector?: string }): void {
  assertRequiredFields({ "Provider name": fields.name, "Provider sector": fields.sector });
}

export function assertClientFields(fields: { clientName?: string; clientPhone?: string }): void {
  assertRequiredFields({ "Client name": fields.clientName, "Client phone": fields.clientPhone });
}

export function assertScheduledInFuture(scheduledAt: Date, now: Date = new Date()): void {
  if (!isAfter(scheduledAt, now)) {
    throw new ValidationError("SCHEDULED_IN_PAST", "Scheduled time must be in the future");
  }
}

export function assertProviderAcceptsBookings(provider: Provider): void {
  if (!provider.isActive) {
    throw new ValidationError("PROVIDER_INACTIVE", "provider is not accepting bookings");
  }
}
