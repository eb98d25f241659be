import { z } from "zod";
import { DEFAULT_LIST_LIMIT } from "@/lib/store/types";

const envSchema = z.object({
  BOOKING_STORE: z.enum(["memory", "supabase"]).default("memory"),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  BOOKING_LIST_MAX_LIMIT: z.coerce.number().int().positive().default(DEFAULT_LIST_LIMIT),
});

export type FrontDeskConfig =
  | { store: "memory"; listMaxLimit: number }
  | { store: "supabase"; listMaxLimit: number; supabaseUrl: string; supabaseServiceRoleKey: string };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): FrontDeskConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid front desk configuration: ${fields}`);
  }

  const { BOOKING_STORE, SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, BOOKING_LIST_MAX_LIMIT } = parsed.data;

  if (BOOKING_STORE === "memory") {
    return { store: "memory", listMaxLimit: BOOKING_LIST_MAX_LIMIT };
  }

  if (!SUPABASE_URL) throw new Error("Supabase URL is not configured");
  if (!SUPABASE_SERVICE_ROLE_KEY) throw new Error("Supabase service role key is not configured");

  return {
    store: "supabase",
    listMaxLimit: BOOKING_LIST_MAX_LIMIT,
    supabaseUrl: SUPABASE_URL,
    supabaseServiceRoleKey: SUPABASE_SERVICE_ROLE_KEY,
  };
}
