import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The cube uses no browser or Node.js specific API.
  // zod is the only runtime dependency and stays external.
  platform: "neutral",
});
