import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["{shared,shell,interfaces}/*/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
    unstubGlobals: true,
  },
});
