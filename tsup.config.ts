import { defineConfig } from "tsup";

export default defineConfig([
  // Main entry (library)
  {
    entry: ["src/index.ts"],
    format: ["cjs", "esm"],
    dts: true,
    clean: true,
    sourcemap: true,
    treeshake: true,
  },
  // CLI entry
  {
    entry: { cli: "src/cli/index.ts" },
    outDir: "dist",
    format: ["cjs"],
    dts: false,
    sourcemap: false,
    treeshake: true,
    minify: false,
  },
]);
