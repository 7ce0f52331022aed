import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.mts"],
    // automatic mock cleanup - no manual afterEach blocks for vi.spyOn
    restoreMocks: true,
  },
});
