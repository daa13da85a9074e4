import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["irc/**/*.test.ts", "cli/**/*.test.ts"],
  },
});
