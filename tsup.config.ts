import { defineConfig } from "tsup";

export default defineConfig([
  // Public library
  {
    entry: {
      index: "src/index.ts",
    },
    format: ["esm"],
    dts: false,
    sourcemap: true,
    clean: true,
    platform: "node",
    target: "node20",
    external: ["effect", /^@effect\//, /^@aws-sdk\//],
  },
  // CLI - bundle effect so the binary starts without resolving it twice
  {
    entry: {
      "cli/index": "src/cli/index.ts",
    },
    format: ["esm"],
    dts: false,
    sourcemap: true,
    platform: "node",
    target: "node20",
    noExternal: [
      "effect",
      /^@effect\//,
    ],
    external: [
      /^@aws-sdk\//,
      "archiver",
      "esbuild",
      "glob",
    ],
    banner: {
      js: `import { createRequire } from 'module'; const require = createRequire(import.meta.url);`,
    },
  },
]);
