import { randomUUID } from "crypto";
import { NotFoundError } from "@/lib/domain/errors";
import { BOOKING_FIELDS, PROVIDER_FIELDS } from "@/lib/domain/types";
import type { Booking, BookingDraft, BookingPatch, Provider, ProviderDraft, ProviderPatch } from "@/lib/domain/types";
import { DEFAULT_LIST_LIMIT, type EntityStore, type Filter, type FrontDeskStores, type ListQuery } from "./types";

interface RecordMeta {
  id: string;
  createdAt: string;
  updatedAt: string;
}

interface MemoryStoreOptions<T, TDraft, TPatch> {
  entity: string;
  build: (draft: TDraft, meta: RecordMeta) => T;
  merge: (current: T, patch: TPatch, updatedAt: string) => T;
  now?: () => Date;
}

function compare(left: unknown, right: unknown): number | null {
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  return null;
}

function matches<T>(record: T, filter: Filter<T>): boolean {
  const value: unknown = record[filter.field];
  if (filter.op === "eq") {
    return value === filter.value;
  }
  const order = compare(value, filter.value);
  if (order === null) {
    return false;
  }
  return filter.op === "gte" ? order >= 0 : order <= 0;
}

/**
 * Map-backed store. Each call reads and writes one record synchronously, so
 * concurrent updates to the same record resolve as last writer wins.
 */
export class MemoryEntityStore<T extends RecordMeta, TDraft, TPatch> implements EntityStore<T, TDraft, TPatch> {
  private readonly records = new Map<string, T>();
  private readonly options: MemoryStoreOptions<T, TDraft, TPatch>;

  constructor(options: MemoryStoreOptions<T, TDraft, TPatch>) {
    this.options = options;
  }

  private timestamp(): string {
    return (this.options.now ?? (() => new Date()))().toISOString();
  }

  async create(draft: TDraft): Promise<T> {
    const stamp = this.timestamp();
    const record = this.options.build(draft, { id: randomUUID(), createdAt: stamp, updatedAt: stamp });
    this.records.set(record.id, record);
    return { ...record };
  }

  async get(id: string): Promise<T> {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(this.options.entity, id);
    }
    return { ...record };
  }

  async list(query: ListQuery<T> = {}): Promise<T[]> {
    const { filters = [], orderBy, offset = 0, limit = DEFAULT_LIST_LIMIT } = query;
    const rows = [...this.records.values()].filter((record) => filters.every((filter) => matches(record, filter)));

    if (orderBy) {
      // Array#sort is stable, so equal keys stay in insertion order.
      rows.sort((a, b) => compare(a[orderBy], b[orderBy]) ?? 0);
    }

    return rows.slice(offset, offset + limit).map((record) => ({ ...record }));
  }

  async update(id: string, patch: TPatch): Promise<T> {
    const current = this.records.get(id);
    if (!current) {
      throw new NotFoundError(this.options.entity, id);
    }
    const stamp = this.timestamp();
    const updatedAt = stamp > current.updatedAt ? stamp : current.updatedAt;
    const next = this.options.merge(current, patch, updatedAt);
    this.records.set(id, next);
    return { ...next };
  }

  async delete(id: string): Promise<void> {
    if (!this.records.delete(id)) {
      throw new NotFoundError(this.options.entity, id);
    }
  }
}

function mergeDefined<T, K extends keyof T>(current: T, patch: { [P in K]?: T[P] }, keys: readonly K[]): T {
  const next = { ...current };
  for (const key of keys) {
    const value = patch[key];
    if (value !== undefined) {
      next[key] = value;
    }
  }
  return next;
}

export function createMemoryStores(options: { now?: () => Date } = {}): FrontDeskStores {
  const providers = new MemoryEntityStore<Provider, ProviderDraft, ProviderPatch>({
    entity: "provider",
    now: options.now,
    build: (draft, meta) => ({ ...draft, ...meta }),
    merge: (current, patch, updatedAt) => ({ ...mergeDefined(current, patch, PROVIDER_FIELDS), updatedAt }),
  });

  const bookings = new MemoryEntityStore<Booking, BookingDraft, BookingPatch>({
    entity: "booking",
    now: options.now,
    build: (draft, meta) => ({ ...draft, ...meta }),
    merge: (current, patch, updatedAt) => ({ ...mergeDefined(current, patch, BOOKING_FIELDS), updatedAt }),
  });

  return { providers, bookings };
}
