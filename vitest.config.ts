import { defineConfig } from "vitest/config";
import os from "os";
import path from "path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      SUBTITLES_FOLDER: path.join(os.tmpdir(), "mcp-sub2clip-tests", "subtitles"),
      OUTPUT_FOLDER: path.join(os.tmpdir(), "mcp-sub2clip-tests", "output"),
      LOG_LEVEL: "error",
    },
  },
});
