import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        globalSetup: "./tests/global-setup.ts",
        // Worker-thread and child-process job tests compete for CPU
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
        testTimeout: 15_000,
        coverage: {
            provider: "v8",
            reporter: ["text", "json", "html"],
            exclude: ["node_modules/", "dist/", "tests/", "*.config.*"],
        },
    },
});
