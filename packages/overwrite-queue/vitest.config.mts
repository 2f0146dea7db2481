import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.mts"],
    environment: "node",
    // auto-restore vi.spyOn after each test
    restoreMocks: true,
  },
});
