import type { z } from "zod";
import { ValidationError } from "@/lib/domain/errors";

export function parseInput<TSchema extends z.ZodTypeAny>(schema: TSchema, input: unknown): z.output<TSchema> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const { fieldErrors, formErrors } = parsed.error.flatten();
    const details = formErrors.length > 0 ? { ...fieldErrors, _form: formErrors } : fieldErrors;
    throw new ValidationError("INVALID_INPUT", "Invalid request", details);
  }
  return parsed.data;
}
