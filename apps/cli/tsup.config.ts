import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // Workspace packages expose TypeScript sources; bundle them into the output
  noExternal: [/^@flipside\//],

  banner: {
    js: "#!/usr/bin/env node",
  },
});
