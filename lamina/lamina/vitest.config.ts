import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["./src/**/*.test.ts"],
    // session tests force collection of dropped proxies
    poolOptions: { forks: { execArgv: ["--expose-gc"] } },
  },
});
