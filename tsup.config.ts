import { defineConfig } from "tsup";

export default defineConfig({
    entry: ["src/index.ts"],
    format: ["esm", "cjs"],
    dts: true,
    sourcemap: false,
    minify: true,
    treeshake: true,
    splitting: true, // ESM only
    clean: true,
    outDir: "dist",
    target: "es2022",
});
