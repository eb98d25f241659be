export type UUID = string;

export const BOOKING_STATUSES = ["pending", "confirmed", "completed", "cancelled"] as const;

export type BookingStatus = (typeof BOOKING_STATUSES)[number];

/**
 * Suggested values for UI pickers. The core accepts any non-empty sector.
 */
export const RECOMMENDED_SECTORS = [
  "medical",
  "dental",
  "real_estate",
  "transportation",
  "laboratory",
  "hospitality",
  "automotive",
  "beauty",
  "legal",
  "education",
  "veterinary",
  "fitness",
  "photography",
  "consulting",
  "maintenance",
  "food_service",
  "entertainment",
  "other",
] as const;

export type RecommendedSector = (typeof RECOMMENDED_SECTORS)[number];

export interface Provider {
  id: UUID;
  name: string;
  sector: string;
  phone: string | null;
  email: string | null;
  address: string | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface Booking {
  id: UUID;
  providerId: UUID;
  clientName: string;
  clientPhone: string;
  clientEmail: string | null;
  serviceType: string | null;
  scheduledAt: string;
  status: BookingStatus;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
}

type StoreManaged = "id" | "createdAt" | "updatedAt";

export type ProviderDraft = Omit<Provider, StoreManaged>;
export type ProviderPatch = Partial<ProviderDraft>;

export type BookingDraft = Omit<Booking, StoreManaged>;
export type BookingPatch = Partial<BookingDraft>;

export const PROVIDER_FIELDS = ["name", "sector", "phone", "email", "address", "isActive"] as const satisfies readonly (keyof ProviderDraft)[];

export const BOOKING_FIELDS = [
  "providerId",
  "clientName",
  "clientPhone",
  "clientEmail",
  "serviceType",
  "scheduledAt",
  "status",
  "notes",
] as const satisfies readonly (keyof BookingDraft)[];
