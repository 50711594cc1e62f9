import { defineConfig } from "tsup";

export default defineConfig({
  entry: { cli: "src/cli/cli.ts" },
  format: ["esm"],
  target: "node20",
  platform: "node",
  clean: true,
  splitting: false,
  sourcemap: true,
  shims: true,
});
