import path from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(rootDir, "shared"),
    },
  },
  test: {
    environment: "node",
    include: ["scripts/**/*.{test,spec}.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
    testTimeout: 15_000,
  },
});
