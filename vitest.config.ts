import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
    plugins: [react()],
    test: {
        environment: "jsdom",
        include: ["core/src/**/*.test.ts", "client/src/**/*.test.{ts,tsx}"],
        setupFiles: ["./vitest.setup.ts"],
    },
});
