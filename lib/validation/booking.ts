import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import { BOOKING_STATUSES } from "@/lib/domain/types";
import { sanitizePhone } from "@/lib/utils/sanitize";
import { optionalEmail, optionalText, requiredText } from "./provider";

/** Accepts a Date or an ISO-8601 string; strings without an offset are read as local time. */
export const dateTimeInput = z.union([z.date(), z.string().trim().min(1)]).transform((value, ctx) => {
  const date = typeof value === "string" ? parseISO(value) : value;
  if (!isValid(date)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Must be an ISO-8601 date-time" });
    return z.NEVER;
  }
  return date;
});

const clientPhone = z
  .string({ required_error: "Client phone is required" })
  .max(50, "Client phone must be at most 50 characters")
  .transform(sanitizePhone);

export const bookingStatusSchema = z.enum(BOOKING_STATUSES);

export const createBookingSchema = z.object({
  providerId: z.string({ required_error: "Provider is required" }).trim().uuid("Provider id must be a UUID"),
  clientName: requiredText("Client name", 255),
  clientPhone,
  clientEmail: optionalEmail,
  serviceType: optionalText(z.string().max(100, "Service type must be at most 100 characters")),
  scheduledAt: dateTimeInput,
  notes: optionalText(),
});

export type CreateBookingInput = z.input<typeof createBookingSchema>;
export type CreateBookingData = z.output<typeof createBookingSchema>;

export const updateBookingSchema = z.object({
  clientName: requiredText("Client name", 255).optional(),
  clientPhone: clientPhone.optional(),
  clientEmail: optionalEmail,
  serviceType: optionalText(z.string().max(100, "Service type must be at most 100 characters")),
  scheduledAt: dateTimeInput.optional(),
  status: bookingStatusSchema.optional(),
  notes: optionalText(),
});

export type UpdateBookingInput = z.input<typeof updateBookingSchema>;
export type UpdateBookingData = z.output<typeof updateBookingSchema>;

export const listBookingsSchema = z.object({
  providerId: z.string().trim().uuid("Provider id must be a UUID").optional(),
  status: bookingStatusSchema.optional(),
  from: dateTimeInput.optional(),
  to: dateTimeInput.optional(),
  offset: z.number().int().min(0).optional(),
  limit: z.number().int().min(1).optional(),
});

export type ListBookingsInput = z.input<typeof listBookingsSchema>;
