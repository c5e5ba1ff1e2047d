import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "shared",
          root: "./shared",
          include: ["src/**/*.test.ts"],
        },
      },
      {
        resolve: {
          alias: {
            "@mlreport/shared": new URL("./shared/src/index.ts", import.meta.url).pathname,
          },
        },
        test: {
          name: "reporter",
          root: "./reporter",
          include: ["src/**/*.test.ts"],
        },
      },
    ],
  },
});
