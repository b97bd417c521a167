import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    cli: "src/cli.ts",
  },
  format: "esm",
  outDir: "dist",
  clean: true,
  dts: false,
  sourcemap: false,
  target: "es2022",
  platform: "node",
  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@indietreat\//],
});
