import { loadConfig, type FrontDeskConfig } from "./config";
import * as bookings from "./domain/bookings";
import * as providers from "./domain/providers";
import type { SectorRuleRegistry } from "./domain/sector-rules";
import type { BookingStatus } from "./domain/types";
import { createMemoryStores } from "./store/memory";
import type { FrontDeskStores } from "./store/types";
import { getServiceRoleClient } from "./supabase/server";
import { createSupabaseStores } from "./supabase/store";
import type { CreateBookingInput, ListBookingsInput, UpdateBookingInput } from "./validation/booking";
import type { ListProvidersInput, RegisterProviderInput, UpdateProviderInput } from "./validation/provider";

export * from "./domain/errors";
export * from "./domain/types";
export * from "./domain/booking-lifecycle";
export {
  createSectorRuleRegistry,
  defaultSectorRules,
  registerSectorRule,
  type BookingCandidate,
  type RuleViolation,
  type SectorRule,
  type SectorRuleRegistry,
} from "./domain/sector-rules";
export { loadConfig, type FrontDeskConfig } from "./config";
export { createMemoryStores } from "./store/memory";
export { createSupabaseStores } from "./supabase/store";
export type { EntityStore, Filter, FrontDeskStores, ListQuery } from "./store/types";

export function createStores(config: FrontDeskConfig): FrontDeskStores {
  switch (config.store) {
    case "memory":
      return createMemoryStores();
    case "supabase":
      return createSupabaseStores(getServiceRoleClient(config.supabaseUrl, config.supabaseServiceRoleKey));
    default: {
      const exhaustiveCheck: never = config;
      return exhaustiveCheck;
    }
  }
}

export interface FrontDeskOptions {
  stores?: FrontDeskStores;
  sectorRules?: SectorRuleRegistry;
  now?: () => Date;
}

/**
 * Binds the booking operations to one set of stores. The returned object holds
 * no state of its own beyond those handles.
 */
export function createFrontDesk(config: FrontDeskConfig = loadConfig(), options: FrontDeskOptions = {}) {
  const stores = options.stores ?? createStores(config);
  const clock = options.now ?? (() => new Date());
  const listOptions = { maxLimit: config.listMaxLimit };

  return {
    stores,
    registerProvider: (input: RegisterProviderInput) => providers.registerProvider(stores, input),
    getProvider: (providerId: string) => providers.getProvider(stores, providerId),
    listProviders: (input?: ListProvidersInput) => providers.listProviders(stores, input, listOptions),
    updateProvider: (providerId: string, input: UpdateProviderInput) =>
      providers.updateProvider(stores, providerId, input),
    deactivateProvider: (providerId: string) => providers.deactivateProvider(stores, providerId),
    deleteProvider: (providerId: string) => providers.deleteProvider(stores, providerId),

    createBooking: (input: CreateBookingInput) =>
      bookings.createBooking(stores, input, { now: clock(), sectorRules: options.sectorRules }),
    getBooking: (bookingId: string) => bookings.getBooking(stores, bookingId),
    listBookings: (input?: ListBookingsInput) => bookings.listBookings(stores, input, listOptions),
    updateBooking: (bookingId: string, input: UpdateBookingInput) =>
      bookings.updateBooking(stores, bookingId, input, { now: clock() }),
    changeBookingStatus: (bookingId: string, status: BookingStatus) =>
      bookings.changeBookingStatus(stores, bookingId, status),
    cancelBooking: (bookingId: string) => bookings.cancelBooking(stores, bookingId),
    deleteBooking: (bookingId: string) => bookings.deleteBooking(stores, bookingId),
  };
}

export type FrontDesk = ReturnType<typeof createFrontDesk>;
