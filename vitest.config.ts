import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "~": path.resolve(root, "./src"),
      "identity-auth-core": path.resolve(root, "./src/index.ts"),
    },
  },
  test: {
    environment: "node",
    sequence: { concurrent: false },
    isolate: true,
    reporters: process.env.GITHUB_ACTIONS
      ? ["github-actions", "dot", "junit", "json"]
      : ["default"],
    include: ["src/__tests__/**/*.test.ts"],
    exclude: ["**/*.d.ts", "node_modules/**"],
    coverage: {
      provider: "istanbul",
      reporter: ["text", "html", "json"],
      include: ["src/**/*.ts"],
      exclude: ["src/__tests__/**", "dist", "vitest.config.ts"],
      thresholds: { lines: 90, functions: 90, branches: 85, statements: 90 },
    },
  },
});
