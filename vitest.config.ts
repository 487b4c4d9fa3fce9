import { defineConfig } from "vitest/config";

const workspaceProjects = [
  ["./packages/config/vitest.config.ts", "./packages/config"],
  ["./packages/io/vitest.config.ts", "./packages/io"],
  ["./apps/cli/vitest.config.ts", "./apps/cli"],
] as const;

export default defineConfig({
  test: {
    projects: workspaceProjects.map(([configPath, root]) => ({
      root,
      extends: configPath,
    })),
  },
});
