import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const dirname = path.dirname(fileURLToPath(import.meta.url));
const resolveFromSrc = (...segments: string[]) => path.resolve(dirname, "src", ...segments);

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    env: {
      LOG_LEVEL: "SILENT",
    },
  },
  resolve: {
    alias: {
      "@/lib": resolveFromSrc("lib"),
      "@/types": resolveFromSrc("types"),
    },
  },
});
