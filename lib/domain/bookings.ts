import {
  assertClientFields,
  assertProviderAcceptsBookings,
  assertScheduledInFuture,
} from "./booking-rules";
import {
  INITIAL_BOOKING_STATUS,
  cancelBooking as cancelBookingTransition,
  transitionBooking,
  type TransitionFields,
} from "./booking-lifecycle";
import { NotFoundError, ReferenceError } from "./errors";
import { resolveLimit, type ListOptions } from "./providers";
import { assertSectorRules, defaultSectorRules, type SectorRuleRegistry } from "./sector-rules";
import type { Booking, BookingStatus, Provider } from "./types";
import { eq, gte, lte, type Filter, type FrontDeskStores, type ProviderStore } from "@/lib/store/types";
import {
  createBookingSchema,
  listBookingsSchema,
  updateBookingSchema,
  type CreateBookingData,
  type CreateBookingInput,
  type ListBookingsInput,
  type UpdateBookingData,
  type UpdateBookingInput,
} from "@/lib/validation/booking";
import { parseInput } from "@/lib/validation/parse";

export interface BookingOperationOptions {
  now?: Date;
  sectorRules?: SectorRuleRegistry;
}

async function resolveProvider(providers: ProviderStore, providerId: string): Promise<Provider> {
  try {
    return await providers.get(providerId);
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new ReferenceError("PROVIDER_NOT_FOUND", `Provider ${providerId} not found`);
    }
    throw error;
  }
}

export async function createBooking(
  stores: FrontDeskStores,
  input: CreateBookingInput,
  { now = new Date(), sectorRules = defaultSectorRules }: BookingOperationOptions = {},
): Promise<Booking> {
  const data: CreateBookingData = parseInput(createBookingSchema, input);
  assertClientFields(data);

  const provider = await resolveProvider(stores.providers, data.providerId);
  assertProviderAcceptsBookings(provider);
  assertScheduledInFuture(data.scheduledAt, now);
  assertSectorRules(sectorRules, provider.sector, data);

  return stores.bookings.create({
    providerId: provider.id,
    clientName: data.clientName,
    clientPhone: data.clientPhone,
    clientEmail: data.clientEmail ?? null,
    serviceType: data.serviceType ?? null,
    scheduledAt: data.scheduledAt.toISOString(),
    status: INITIAL_BOOKING_STATUS,
    notes: data.notes ?? null,
  });
}

export function getBooking(stores: FrontDeskStores, bookingId: string): Promise<Booking> {
  return stores.bookings.get(bookingId);
}

/** Ordered by scheduled time; bookings at the same time keep creation order. */
export async function listBookings(
  stores: FrontDeskStores,
  input: ListBookingsInput = {},
  options: ListOptions = {},
): Promise<Booking[]> {
  const query = parseInput(listBookingsSchema, input);
  const filters: Filter<Booking>[] = [];

  if (query.providerId !== undefined) {
    filters.push(eq<Booking>("providerId", query.providerId));
  }
  if (query.status !== undefined) {
    filters.push(eq<Booking>("status", query.status));
  }
  if (query.from !== undefined) {
    filters.push(gte<Booking>("scheduledAt", query.from.toISOString()));
  }
  if (query.to !== undefined) {
    filters.push(lte<Booking>("scheduledAt", query.to.toISOString()));
  }

  return stores.bookings.list({
    filters,
    orderBy: "scheduledAt",
    offset: query.offset,
    limit: resolveLimit(query.limit, options.maxLimit),
  });
}

/**
 * Partial update. Non-status fields are checked first; a requested status
 * always goes through the lifecycle (so a self-edge such as
 * cancelled -> cancelled is rejected) and is written together with the
 * other fields.
 */
export async function updateBooking(
  stores: FrontDeskStores,
  bookingId: string,
  input: UpdateBookingInput,
  { now = new Date() }: Pick<BookingOperationOptions, "now"> = {},
): Promise<Booking> {
  const data: UpdateBookingData = parseInput(updateBookingSchema, input);
  assertClientFields(data);
  if (data.scheduledAt) {
    assertScheduledInFuture(data.scheduledAt, now);
  }

  const fields: TransitionFields = {
    clientName: data.clientName,
    clientPhone: data.clientPhone,
    clientEmail: data.clientEmail,
    serviceType: data.serviceType,
    scheduledAt: data.scheduledAt?.toISOString(),
    notes: data.notes,
  };

  if (data.status !== undefined) {
    return transitionBooking(stores.bookings, bookingId, data.status, fields);
  }

  return stores.bookings.update(bookingId, fields);
}

export function changeBookingStatus(
  stores: FrontDeskStores,
  bookingId: string,
  status: BookingStatus,
): Promise<Booking> {
  return transitionBooking(stores.bookings, bookingId, status);
}

export function cancelBooking(stores: FrontDeskStores, bookingId: string): Promise<Booking> {
  return cancelBookingTransition(stores.bookings, bookingId);
}

/** Hard delete, allowed in any status. */
export function deleteBooking(stores: FrontDeskStores, bookingId: string): Promise<void> {
  return stores.bookings.delete(bookingId);
}
