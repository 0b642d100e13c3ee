import { defineConfig } from "tsup";
import type { Options } from "tsup";

export const baseOptions: Options = {
  format: ["esm", "cjs"],
  dts: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  splitting: false,
  outDir: "dist",
};

export default defineConfig(baseOptions);
