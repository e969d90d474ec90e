import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    worker: "src/worker/schedule.worker.ts",
  },
  format: ["esm"],
  target: "node20",
  dts: { entry: "src/index.ts" },
  splitting: false,
  sourcemap: true,
  clean: true,
});
