import type { Booking, BookingDraft, BookingPatch, Provider, ProviderDraft, ProviderPatch } from "@/lib/domain/types";

export const DEFAULT_LIST_LIMIT = 100;

export type FilterOperator = "eq" | "gte" | "lte";

export type FilterValue = string | number | boolean;

export interface Filter<T> {
  field: keyof T & string;
  op: FilterOperator;
  value: FilterValue;
}

export interface ListQuery<T> {
  filters?: Filter<T>[];
  /** Sort key; records with equal keys keep insertion order. Omit for insertion order. */
  orderBy?: keyof T & string;
  offset?: number;
  limit?: number;
}

export interface EntityStore<T extends { id: string }, TDraft, TPatch> {
  create(draft: TDraft): Promise<T>;
  get(id: string): Promise<T>;
  list(query?: ListQuery<T>): Promise<T[]>;
  update(id: string, patch: TPatch): Promise<T>;
  delete(id: string): Promise<void>;
}

export type ProviderStore = EntityStore<Provider, ProviderDraft, ProviderPatch>;
export type BookingStore = EntityStore<Booking, BookingDraft, BookingPatch>;

export interface FrontDeskStores {
  providers: ProviderStore;
  bookings: BookingStore;
}

export function eq<T>(field: keyof T & string, value: FilterValue): Filter<T> {
  return { field, op: "eq", value };
}

export function gte<T>(field: keyof T & string, value: FilterValue): Filter<T> {
  return { field, op: "gte", value };
}

export function lte<T>(field: keyof T & string, value: FilterValue): Filter<T> {
  return { field, op: "lte", value };
}
