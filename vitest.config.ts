import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@showing-desk/shared": pkg("shared"),
      "@showing-desk/db": pkg("db"),
      "@showing-desk/domain": pkg("domain"),
      "@showing-desk/integrations": pkg("integrations"),
      "@showing-desk/agent": pkg("agent")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts", "apps/*/app/**/*.test.ts"]
  }
});
