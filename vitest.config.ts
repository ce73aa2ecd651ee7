import { defineConfig } from "vitest/config";
import { tmpdir } from "node:os";
import { join } from "node:path";

const testRoot = join(tmpdir(), "celsheet-test");

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      CELSHEET_LOG_DIR: join(testRoot, "logs"),
      CELSHEET_CONFIG_DIR: join(testRoot, "config"),
    },
  },
});
