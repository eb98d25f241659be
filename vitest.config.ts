import { fileURLToPath } from "node:url";
import path from "node:path";
import { defineConfig } from "vitest/config";

const rootDir = fileURLToPath(new URL("./", import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    include: ["tests/**/*.test.ts"],
    // Tests never reach a real database.
    env: { BOOKING_STORE: "memory" },
  },
  resolve: {
    alias: {
      "@": path.join(rootDir),
    },
  },
});
