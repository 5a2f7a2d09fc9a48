import { defineConfig } from "tsdown";

export default defineConfig({
  entry: ["src/main.ts"],
  outDir: "dist",
  format: "esm",
  platform: "node",
  // Workspace packages export TypeScript sources, so they are bundled in.
  noExternal: [/^@vmreconcile\//],
  external: ["better-sqlite3"],
  outExtensions: () => ({ js: ".js" }),
  clean: true,
  sourcemap: false,
});
