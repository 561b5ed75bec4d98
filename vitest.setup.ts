import "@testing-library/jest-dom/vitest";
import { cleanup } from "@testing-library/react";
import { afterEach } from "vitest";
import { setDebugLogging } from "@clean-posts/core";

setDebugLogging(false);

afterEach(() => {
    cleanup();
});
