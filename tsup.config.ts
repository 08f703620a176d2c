import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The lock and file entry points use node:fs; papaparse and zod stay
  // external as regular dependencies.
  platform: "node",
  target:   "node20",
});
