import { describe, expect, it } from "vitest";
import {
  assertClientFields,
  assertProviderAcceptsBookings,
  assertProviderFields,
  assertScheduledInFuture,
} from "@/lib/domain/booking-rules";
import { ValidationError } from "@/lib/domain/errors";
import type { Provider } from "@/lib/domain/types";

const provider: Provider = {
  id: "provider-1",
  name: "City Diagnostic Labs",
  sector: "laboratory",
  phone: null,
  email: null,
  address: null,
  isActive: true,
  createdAt: "2030-01-01T00:00:00.000Z",
  updatedAt: "2030-01-01T00:00:00.000Z",
};

describe("assertScheduledInFuture", () => {
  const now = new Date("2030-01-10T12:00:00.000Z");

  it("accepts times strictly after now", () => {
    expect(() => assertScheduledInFuture(new Date("2030-01-10T12:00:01.000Z"), now)).not.toThrow();
  });

  it("rejects now and the past", () => {
    expect(() => assertScheduledInFuture(new Date(now), now)).toThrowError("Scheduled time must be in the future");
    expect(() => assertScheduledInFuture(new Date("2029-12-31T00:00:00.000Z"), now)).toThrowError(ValidationError);
  });
});

describe("required fields", () => {
  it("rejects blank client name or phone", () => {
    expect(() => assertClientFields({ clientName: "  ", clientPhone: "+1888999000" })).toThrowError(
      "Client name cannot be empty",
    );
    expect(() => assertClientFields({ clientName: "Sarah", clientPhone: "" })).toThrowError(
      "Client phone cannot be empty",
    );
  });

  it("skips fields that were not supplied", () => {
    expect(() => assertClientFields({})).not.toThrow();
    expect(() => assertProviderFields({ name: "Renamed" })).not.toThrow();
  });

  it("rejects blank provider name or sector", () => {
    expect(() => assertProviderFields({ name: "", sector: "medical" })).toThrowError("Provider name cannot be empty");
    expect(() => assertProviderFields({ name: "Clinic", sector: " " })).toThrowError(
      "Provider sector cannot be empty",
    );
  });
});

describe("assertProviderAcceptsBookings", () => {
  it("rejects inactive providers", () => {
    expect(() => assertProviderAcceptsBookings(provider)).not.toThrow();
    expect(() => assertProviderAcceptsBookings({ ...provider, isActive: false })).toThrowError(
      "provider is not accepting bookings",
    );
  });
});
