import { assertProviderFields } from "./booking-rules";
import { ValidationError } from "./errors";
import type { Booking, Provider } from "./types";
import { DEFAULT_LIST_LIMIT, eq, type Filter, type FrontDeskStores } from "@/lib/store/types";
import { parseInput } from "@/lib/validation/parse";
import {
  listProvidersSchema,
  registerProviderSchema,
  updateProviderSchema,
  type ListProvidersInput,
  type RegisterProviderData,
  type RegisterProviderInput,
  type UpdateProviderData,
  type UpdateProviderInput,
} from "@/lib/validation/provider";

export interface ListOptions {
  maxLimit?: number;
}

export function resolveLimit(limit: number | undefined, maxLimit: number = DEFAULT_LIST_LIMIT): number {
  return Math.min(limit ?? DEFAULT_LIST_LIMIT, maxLimit);
}

export async function registerProvider(stores: FrontDeskStores, input: RegisterProviderInput): Promise<Provider> {
  const data: RegisterProviderData = parseInput(registerProviderSchema, input);
  assertProviderFields(data);

  return stores.providers.create({
    name: data.name,
    sector: data.sector,
    phone: data.phone ?? null,
    email: data.email ?? null,
    address: data.address ?? null,
    isActive: true,
  });
}

export function getProvider(stores: FrontDeskStores, providerId: string): Promise<Provider> {
  return stores.providers.get(providerId);
}

export async function listProviders(
  stores: FrontDeskStores,
  input: ListProvidersInput = {},
  options: ListOptions = {},
): Promise<Provider[]> {
  const query = parseInput(listProvidersSchema, input);
  const filters: Filter<Provider>[] = [];

  if (query.sector !== undefined) {
    filters.push(eq<Provider>("sector", query.sector));
  }
  if (query.isActive !== undefined) {
    filters.push(eq<Provider>("isActive", query.isActive));
  }

  return stores.providers.list({
    filters,
    offset: query.offset,
    limit: resolveLimit(query.limit, options.maxLimit),
  });
}

export async function updateProvider(
  stores: FrontDeskStores,
  providerId: string,
  input: UpdateProviderInput,
): Promise<Provider> {
  const data: UpdateProviderData = parseInput(updateProviderSchema, input);
  assertProviderFields(data);

  return stores.providers.update(providerId, {
    name: data.name,
    sector: data.sector,
    phone: data.phone,
    email: data.email,
    address: data.address,
    isActive: data.isActive,
  });
}

/** Soft removal: the provider stays on record but stops accepting bookings. */
export function deactivateProvider(stores: FrontDeskStores, providerId: string): Promise<Provider> {
  return stores.providers.update(providerId, { isActive: false });
}

export async function deleteProvider(stores: FrontDeskStores, providerId: string): Promise<void> {
  const linked = await stores.bookings.list({ filters: [eq<Booking>("providerId", providerId)], limit: 1 });
  if (linked.length > 0) {
    throw new ValidationError(
      "PROVIDER_HAS_BOOKINGS",
      "Provider still has bookings; deactivate it or delete its bookings first",
    );
  }

  await stores.providers.delete(providerId);
}
