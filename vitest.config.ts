import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["db/**/*.test.ts", "lib/**/*.test.ts"],
        environment: "node",
        // each PGlite instance boots its own wasm Postgres
        testTimeout: 30_000,
    },
});
