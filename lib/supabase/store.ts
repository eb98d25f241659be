import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { NotFoundError, StorageFailureError } from "@/lib/domain/errors";
import {
  BOOKING_STATUSES,
  type Booking,
  type BookingDraft,
  type BookingPatch,
  type Provider,
  type ProviderDraft,
  type ProviderPatch,
} from "@/lib/domain/types";
import { DEFAULT_LIST_LIMIT, type EntityStore, type FrontDeskStores, type ListQuery } from "@/lib/store/types";

// Postgres invalid_text_representation: the id is not a UUID, so no row can match.
const INVALID_TEXT_REPRESENTATION = "22P02";

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

export const providerRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  sector: z.string(),
  phone: z.string().nullable(),
  email: z.string().nullable(),
  address: z.string().nullable(),
  is_active: z.boolean(),
  created_at: timestamp,
  updated_at: timestamp,
});

export type ProviderRow = z.input<typeof providerRowSchema>;

export const bookingRowSchema = z.object({
  id: z.string(),
  provider_id: z.string(),
  client_name: z.string(),
  client_phone: z.string(),
  client_email: z.string().nullable(),
  service_type: z.string().nullable(),
  scheduled_at: timestamp,
  status: z.enum(BOOKING_STATUSES),
  notes: z.string().nullable(),
  created_at: timestamp,
  updated_at: timestamp,
});

export type BookingRow = z.input<typeof bookingRowSchema>;

export function mapProviderRow(row: z.output<typeof providerRowSchema>): Provider {
  return {
    id: row.id,
    name: row.name,
    sector: row.sector,
    phone: row.phone,
    email: row.email,
    address: row.address,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function mapBookingRow(row: z.output<typeof bookingRowSchema>): Booking {
  return {
    id: row.id,
    providerId: row.provider_id,
    clientName: row.client_name,
    clientPhone: row.client_phone,
    clientEmail: row.client_email,
    serviceType: row.service_type,
    scheduledAt: row.scheduled_at,
    status: row.status,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

type Columns<Row> = Partial<Omit<Row, "id" | "created_at" | "updated_at">>;

export function toProviderColumns(patch: ProviderPatch): Columns<ProviderRow> {
  return {
    name: patch.name,
    sector: patch.sector,
    phone: patch.phone,
    email: patch.email,
    address: patch.address,
    is_active: patch.isActive,
  };
}

export function toBookingColumns(patch: BookingPatch): Columns<BookingRow> {
  return {
    provider_id: patch.providerId,
    client_name: patch.clientName,
    client_phone: patch.clientPhone,
    client_email: patch.clientEmail,
    service_type: patch.serviceType,
    scheduled_at: patch.scheduledAt,
    status: patch.status,
    notes: patch.notes,
  };
}

interface SupabaseStoreOptions<T, TDraft, TPatch> {
  table: string;
  entity: string;
  rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  columns: { [K in keyof T & string]: string };
  toColumns: (value: TDraft | TPatch) => Record<string, unknown>;
}

/**
 * Store backed by a PostgREST table. `created_at` defaults and the
 * `updated_at` trigger live in supabase/schema.sql.
 */
export class SupabaseEntityStore<T extends { id: string }, TDraft, TPatch> implements EntityStore<T, TDraft, TPatch> {
  constructor(
    private readonly client: SupabaseClient,
    private readonly options: SupabaseStoreOptions<T, TDraft, TPatch>,
  ) {}

  private fail(action: string, error: PostgrestError | z.ZodError): never {
    console.error(error);
    throw new StorageFailureError(`Failed to ${action} ${this.options.entity}: ${error.message}`, { cause: error });
  }

  private failById(action: string, id: string, error: PostgrestError): never {
    if (error.code === INVALID_TEXT_REPRESENTATION) {
      throw new NotFoundError(this.options.entity, id);
    }
    return this.fail(action, error);
  }

  private parseRow(action: string, row: unknown): T {
    const parsed = this.options.rowSchema.safeParse(row);
    if (!parsed.success) {
      return this.fail(action, parsed.error);
    }
    return parsed.data;
  }

  async create(draft: TDraft): Promise<T> {
    const { data, error } = await this.client
      .from(this.options.table)
      .insert(this.options.toColumns(draft))
      .select("*")
      .single();

    if (error) {
      return this.fail("create", error);
    }
    return this.parseRow("create", data);
  }

  async get(id: string): Promise<T> {
    const { data, error } = await this.client.from(this.options.table).select("*").eq("id", id).maybeSingle();

    if (error) {
      return this.failById("load", id, error);
    }
    if (!data) {
      throw new NotFoundError(this.options.entity, id);
    }
    return this.parseRow("load", data);
  }

  async list(query: ListQuery<T> = {}): Promise<T[]> {
    const { filters = [], orderBy, offset = 0, limit = DEFAULT_LIST_LIMIT } = query;
    const { columns } = this.options;

    let request = this.client.from(this.options.table).select("*");

    for (const filter of filters) {
      const column = columns[filter.field];
      switch (filter.op) {
        case "eq":
          request = request.eq(column, filter.value);
          break;
        case "gte":
          request = request.gte(column, filter.value);
          break;
        case "lte":
          request = request.lte(column, filter.value);
          break;
        default: {
          const exhaustiveCheck: never = filter.op;
          return exhaustiveCheck;
        }
      }
    }

    if (orderBy) {
      request = request.order(columns[orderBy], { ascending: true });
    }

    const { data, error } = await request
      .order("created_at", { ascending: true })
      .order("id", { ascending: true })
      .range(offset, offset + limit - 1);

    if (error) {
      return this.fail("list", error);
    }
    return (data ?? []).map((row) => this.parseRow("list", row));
  }

  async update(id: string, patch: TPatch): Promise<T> {
    const { data, error } = await this.client
      .from(this.options.table)
      .update(this.options.toColumns(patch))
      .eq("id", id)
      .select("*")
      .maybeSingle();

    if (error) {
      return this.failById("update", id, error);
    }
    if (!data) {
      throw new NotFoundError(this.options.entity, id);
    }
    return this.parseRow("update", data);
  }

  async delete(id: string): Promise<void> {
    const { data, error } = await this.client.from(this.options.table).delete().eq("id", id).select("id");

    if (error) {
      return this.failById("delete", id, error);
    }
    if (!data || data.length === 0) {
      throw new NotFoundError(this.options.entity, id);
    }
  }
}

export function createSupabaseStores(client: SupabaseClient): FrontDeskStores {
  const providers = new SupabaseEntityStore<Provider, ProviderDraft, ProviderPatch>(client, {
    table: "providers",
    entity: "provider",
    rowSchema: providerRowSchema.transform(mapProviderRow),
    columns: {
      id: "id",
      name: "name",
      sector: "sector",
      phone: "phone",
      email: "email",
      address: "address",
      isActive: "is_active",
      createdAt: "created_at",
      updatedAt: "updated_at",
    },
    toColumns: toProviderColumns,
  });

  const bookings = new SupabaseEntityStore<Booking, BookingDraft, BookingPatch>(client, {
    table: "bookings",
    entity: "booking",
    rowSchema: bookingRowSchema.transform(mapBookingRow),
    columns: {
      id: "id",
      providerId: "provider_id",
      clientName: "client_name",
      clientPhone: "client_phone",
      clientEmail: "client_email",
      serviceType: "service_type",
      scheduledAt: "scheduled_at",
      status: "status",
      notes: "notes",
      createdAt: "created_at",
      updatedAt: "updated_at",
    },
    toColumns: toBookingColumns,
  });

  return { providers, bookings };
}
