import { defineConfig } from "vitest/config";

// Types and id bounds only; behaviour is tested where it is used.
export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    passWithNoTests: true,
  },
});
