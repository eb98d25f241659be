import { InvalidTransitionError } from "./errors";
import type { Booking, BookingPatch, BookingStatus } from "./types";
import type { BookingStore } from "@/lib/store/types";

const TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
  pending: ["confirmed", "cancelled"],
  confirmed: ["completed", "cancelled"],
  completed: [],
  cancelled: [],
};

export const INITIAL_BOOKING_STATUS: BookingStatus = "pending";

export function allowedTransitions(from: BookingStatus): readonly BookingStatus[] {
  return TRANSITIONS[from];
}

export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: BookingStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function assertTransition(from: BookingStatus, to: BookingStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/** Non-status fields that may ride along with a transition in the same write. */
export type TransitionFields = Omit<BookingPatch, "status" | "providerId">;

/**
 * Moves a booking to `to`, writing the status (and any extra fields) in one
 * store update. Rejected edges throw before anything is written.
 */
export async function transitionBooking(
  bookings: BookingStore,
  bookingId: string,
  to: BookingStatus,
  fields: TransitionFields = {},
): Promise<Booking> {
  const current = await bookings.get(bookingId);
  assertTransition(current.status, to);

  const updated = await bookings.update(bookingId, { ...fields, status: to });
  console.info(`booking ${bookingId} moved from ${current.status} to ${to}`);
  return updated;
}

/** Not idempotent: cancelling a cancelled booking throws InvalidTransitionError. */
export function cancelBooking(bookings: BookingStore, bookingId: string): Promise<Booking> {
  return transitionBooking(bookings, bookingId, "cancelled");
}
