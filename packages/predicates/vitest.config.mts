import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "predicates",
    environment: "node",
    // auto-restore vi.spyOn after each test
    restoreMocks: true,
    include: ["src/**/*.test.mts"],
  },
});
