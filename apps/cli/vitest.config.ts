import path from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const workspaceRoot = path.resolve(
  fileURLToPath(new URL(".", import.meta.url)),
  "..",
  ".."
);

const packageAliases = ["config", "io"].flatMap((name) => {
  const basePath = path.resolve(workspaceRoot, "packages", name, "src");
  return [
    { find: `@strata/${name}`, replacement: basePath },
    { find: `@strata/${name}/`, replacement: `${basePath}/` },
  ];
});

export default defineConfig({
  resolve: {
    alias: packageAliases,
  },
  test: {
    name: "cli",
    globals: true,
    include: ["test/**/*.test.ts"],
    environment: "node",
    pool: "threads",
  },
});
