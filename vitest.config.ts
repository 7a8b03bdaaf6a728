import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    environment: "node",
    include: ["lib/**/*.test.ts", "stores/**/*.test.ts"],
  },
  resolve: {
    alias: {
      // Mirror tsconfig.json "paths"
      "@": fileURLToPath(new URL(".", import.meta.url)),
    },
  },
});
