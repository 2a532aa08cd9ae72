import { defineConfig } from "vitest/config";
import path from "path";

const packageSrc = (name: string) => path.resolve(__dirname, "packages", name, "src");

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.spec.ts"]
  },
  resolve: {
    alias: [
      { find: "@ci-probes/shared", replacement: packageSrc("shared") },
      { find: "@ci-probes/logger", replacement: packageSrc("logger") },
      { find: "@ci-probes/jenkins-client", replacement: packageSrc("jenkins-client") },
      { find: "@ci-probes/probes", replacement: packageSrc("probes") }
    ]
  }
});
