import { describe, expect, it } from "vitest";
import { loadConfig } from "@/lib/config";

describe("loadConfig", () => {
  it("defaults to the in-memory store", () => {
    expect(loadConfig({})).toEqual({ store: "memory", listMaxLimit: 100 });
  });

  it("reads Supabase credentials when that store is selected", () => {
    const config = loadConfig({
      BOOKING_STORE: "supabase",
      SUPABASE_URL: "https://project.supabase.test",
      SUPABASE_SERVICE_ROLE_KEY: "test-secret",
      BOOKING_LIST_MAX_LIMIT: "250",
    });

    expect(config).toEqual({
      store: "supabase",
      listMaxLimit: 250,
      supabaseUrl: "https://project.supabase.test",
      supabaseServiceRoleKey: "test-secret",
    });
  });

  it("fails fast when Supabase is selected without credentials", () => {
    expect(() => loadConfig({ BOOKING_STORE: "supabase" })).toThrowError("Supabase URL is not configured");
    expect(() =>
      loadConfig({ BOOKING_STORE: "supabase", SUPABASE_URL: "https://project.supabase.test" }),
    ).toThrowError("Supabase service role key is not configured");
  });

  it("rejects unknown store drivers", () => {
    expect(() => loadConfig({ BOOKING_STORE: "mongo" })).toThrowError("Invalid front desk configuration: BOOKING_STORE");
  });
});
