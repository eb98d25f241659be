import { z } from "zod";
import { sanitizeOptionalText, sanitizePlainText } from "@/lib/utils/sanitize";

export const optionalText = (schema: z.ZodString = z.string()) =>
  schema.transform(sanitizeOptionalText).nullable().optional();

export const requiredText = (label: string, max: number) =>
  z
    .string({ required_error: `${label} is required` })
    .max(max, `${label} must be at most ${max} characters`)
    .transform(sanitizePlainText);

export const optionalEmail = z.string().trim().email("Email looks invalid").nullable().optional();

export const registerProviderSchema = z.object({
  name: requiredText("Provider name", 255),
  sector: requiredText("Sector", 100),
  phone: optionalText(z.string().max(50, "Phone must be at most 50 characters")),
  email: optionalEmail,
  address: optionalText(),
});

export type RegisterProviderInput = z.input<typeof registerProviderSchema>;
export type RegisterProviderData = z.output<typeof registerProviderSchema>;

export const updateProviderSchema = z.object({
  name: requiredText("Provider name", 255).optional(),
  sector: requiredText("Sector", 100).optional(),
  phone: optionalText(z.string().max(50, "Phone must be at most 50 characters")),
  email: optionalEmail,
  address: optionalText(),
  isActive: z.boolean().optional(),
});

export type UpdateProviderInput = z.input<typeof updateProviderSchema>;
export type UpdateProviderData = z.output<typeof updateProviderSchema>;

export const listProvidersSchema = z.object({
  sector: z.string().trim().min(1).optional(),
  isActive: z.boolean().optional(),
  offset: z.number().int().min(0).optional(),
  limit: z.number().int().min(1).optional(),
});

export type ListProvidersInput = z.input<typeof listProvidersSchema>;
