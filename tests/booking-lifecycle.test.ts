import { describe, expect, it } from "vitest";
import {
  allowedTransitions,
  assertTransition,
  canTransition,
  cancelBooking,
  isTerminalStatus,
  transitionBooking,
} from "@/lib/domain/booking-lifecycle";
import { InvalidTransitionError } from "@/lib/domain/errors";
import { BOOKING_STATUSES, type BookingStatus } from "@/lib/domain/types";
import { createMemoryStores } from "@/lib/store/memory";

const ALLOWED: Array<[BookingStatus, BookingStatus]> = [
  ["pending", "confirmed"],
  ["pending", "cancelled"],
  ["confirmed", "completed"],
  ["confirmed", "cancelled"],
];

function isAllowed(from: BookingStatus, to: BookingStatus) {
  return ALLOWED.some(([a, b]) => a === from && b === to);
}

async function seedBooking(status: BookingStatus) {
  const stores = createMemoryStores();
  const booking = await stores.bookings.create({
    providerId: "provider-1",
    clientName: "Sarah",
    clientPhone: "+1888999000",
    clientEmail: null,
    serviceType: "blood_test",
    scheduledAt: "2030-01-18T08:00:00.000Z",
    status,
    notes: null,
  });
  return { stores, booking };
}

describe("booking status transitions", () => {
  it("permits exactly the four lifecycle edges", () => {
    for (const from of BOOKING_STATUSES) {
      for (const to of BOOKING_STATUSES) {
        expect(canTransition(from, to)).toBe(isAllowed(from, to));
      }
    }
  });

  it("treats completed and cancelled as terminal", () => {
    expect(isTerminalStatus("completed")).toBe(true);
    expect(isTerminalStatus("cancelled")).toBe(true);
    expect(isTerminalStatus("pending")).toBe(false);
    expect(allowedTransitions("confirmed")).toEqual(["completed", "cancelled"]);
  });

  it("throws InvalidTransitionError carrying both states", () => {
    try {
      assertTransition("pending", "completed");
      throw new Error("expected assertTransition to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidTransitionError);
      if (error instanceof InvalidTransitionError) {
        expect(error.from).toBe("pending");
        expect(error.to).toBe("completed");
        expect(error.code).toBe("INVALID_TRANSITION");
      }
    }
  });
});

describe("transitionBooking", () => {
  it("writes the new status and leaves the booking untouched on rejection", async () => {
    const { stores, booking } = await seedBooking("pending");

    const confirmed = await transitionBooking(stores.bookings, booking.id, "confirmed");
    expect(confirmed.status).toBe("confirmed");

    await expect(transitionBooking(stores.bookings, booking.id, "pending")).rejects.toBeInstanceOf(
      InvalidTransitionError,
    );
    await expect(transitionBooking(stores.bookings, booking.id, "pending")).rejects.toBeInstanceOf(
      InvalidTransitionError,
    );

    const reloaded = await stores.bookings.get(booking.id);
    expect(reloaded.status).toBe("confirmed");
    expect(reloaded.updatedAt).toBe(confirmed.updatedAt);
  });

  it("rejects every move out of a terminal state", async () => {
    for (const terminal of ["completed", "cancelled"] as const) {
      const { stores, booking } = await seedBooking(terminal);
      for (const to of BOOKING_STATUSES) {
        await expect(transitionBooking(stores.bookings, booking.id, to)).rejects.toBeInstanceOf(
          InvalidTransitionError,
        );
      }
      expect((await stores.bookings.get(booking.id)).status).toBe(terminal);
    }
  });

  it("writes ride-along fields together with the status", async () => {
    const { stores, booking } = await seedBooking("pending");

    const updated = await transitionBooking(stores.bookings, booking.id, "confirmed", { notes: "Fasting required" });
    expect(updated).toMatchObject({ status: "confirmed", notes: "Fasting required" });
  });
});

describe("cancelBooking", () => {
  it("cancels confirmed bookings but is not idempotent", async () => {
    const { stores, booking } = await seedBooking("confirmed");

    const cancelled = await cancelBooking(stores.bookings, booking.id);
    expect(cancelled.status).toBe("cancelled");

    await expect(cancelBooking(stores.bookings, booking.id)).rejects.toBeInstanceOf(InvalidTransitionError);
  });
});
