import { defineConfig } from "rolldown";

export default defineConfig({
  input: "src/cli.ts",
  platform: "node",
  external: [/^node:/, /^@langfuse\//, /^@opentelemetry\//],
  output: {
    file: "dist/hook.js",
    format: "esm",
  },
});
