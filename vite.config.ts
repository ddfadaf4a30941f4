import { builtinModules } from "node:module";
import path from "node:path";
import { defineConfig } from "vite";

const externalDeps = [
  ...builtinModules,
  ...builtinModules.map(name => `node:${name}`),
  "zod",
];

export default defineConfig({
  build: {
    target: "node20",
    lib: {
      entry: {
        index: path.resolve(process.cwd(), "src/index.ts"),
        cli: path.resolve(process.cwd(), "src/cli.ts"),
      },
      formats: ["es"],
      fileName: (_format, entryName) => `${entryName}.js`,
    },
    rollupOptions: {
      external: externalDeps,
    },
  },
});
