import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["src/**/*.test.ts"],
        // keep `vitest` (no args) from watching in CI shells
        watch: false,
    },
});
