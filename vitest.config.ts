import os from "node:os";
import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cli/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
    env: {
      INSTRUCTIONKIT_HOME: path.join(os.tmpdir(), "instructionkit-test-home"),
    },
  },
});
