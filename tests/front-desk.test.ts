import { describe, expect, it } from "vitest";
import { createFrontDesk, createSectorRuleRegistry, InvalidTransitionError, isBookingDeskError } from "@/lib/index";

describe("createFrontDesk", () => {
  const fixedNow = () => new Date("2025-01-10T00:00:00.000Z");

  it("runs the City Diagnostic Labs scenario end to end", async () => {
    const desk = createFrontDesk({ store: "memory", listMaxLimit: 100 }, { now: fixedNow });

    const lab = await desk.registerProvider({ name: "City Diagnostic Labs", sector: "laboratory" });
    const request = {
      providerId: lab.id,
      clientName: "Sarah",
      clientPhone: "+1888999000",
      serviceType: "blood_test",
      scheduledAt: "2025-01-18T08:00:00",
    };

    const booking = await desk.createBooking(request);
    expect(booking.status).toBe("pending");

    await expect(desk.createBooking({ ...request, scheduledAt: "2025-01-18T20:00:00" })).rejects.toThrow(
      "outside operating hours",
    );

    const cancelled = await desk.cancelBooking(booking.id);
    expect(cancelled.status).toBe("cancelled");
    await expect(desk.cancelBooking(booking.id)).rejects.toBeInstanceOf(InvalidTransitionError);

    expect(await desk.listBookings({ providerId: lab.id })).toHaveLength(1);
  });

  it("surfaces failures as coded desk errors", async () => {
    const desk = createFrontDesk({ store: "memory", listMaxLimit: 100 }, { now: fixedNow });
    const caught = await desk.getProvider("00000000-0000-4000-8000-000000000000").catch((error: unknown) => error);

    expect(isBookingDeskError(caught)).toBe(true);
    expect(isBookingDeskError(new Error("plain"))).toBe(false);
    expect(caught).toMatchObject({ kind: "not_found", code: "PROVIDER_NOT_FOUND" });
  });

  it("keeps client text as typed, apart from trimming", async () => {
    const desk = createFrontDesk({ store: "memory", listMaxLimit: 100 }, { now: fixedNow });
    const clinic = await desk.registerProvider({ name: "Harbor Clinic", sector: "medical" });

    const booking = await desk.createBooking({
      providerId: clinic.id,
      clientName: " Ana <Tia> ",
      clientPhone: "5550004444",
      scheduledAt: "2025-01-12T10:00:00Z",
      notes: "Bring forms <A&B>",
    });

    expect(booking.clientName).toBe("Ana <Tia>");
    expect(booking.notes).toBe("Bring forms <A&B>");
  });

  it("caps list sizes with the configured limit", async () => {
    const desk = createFrontDesk({ store: "memory", listMaxLimit: 2 }, { now: fixedNow });

    for (const name of ["One", "Two", "Three"]) {
      await desk.registerProvider({ name, sector: "fitness" });
    }

    expect(await desk.listProviders({ limit: 10 })).toHaveLength(2);
  });

  it("applies a custom sector registry", async () => {
    const desk = createFrontDesk(
      { store: "memory", listMaxLimit: 100 },
      {
        now: fixedNow,
        sectorRules: createSectorRuleRegistry({
          veterinary: [({ notes }) => (notes ? null : { code: "MISSING_PET", message: "missing pet details" })],
        }),
      },
    );
    const vet = await desk.registerProvider({ name: "Paws Clinic", sector: "veterinary" });

    await expect(
      desk.createBooking({
        providerId: vet.id,
        clientName: "Lee",
        clientPhone: "5550003333",
        scheduledAt: "2025-01-12T10:00:00Z",
      }),
    ).rejects.toThrow("missing pet details");
  });
});
