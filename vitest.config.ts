import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const src = (dir: string) =>
  fileURLToPath(new URL(`./src/${dir}`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@db\//, replacement: `${src("db")}/` },
      { find: /^@services\//, replacement: `${src("services")}/` },
      { find: /^@commands\//, replacement: `${src("commands")}/` },
      { find: /^@\//, replacement: `${src("")}` },
    ],
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/*.test.tsx"],
    testTimeout: 10000,
  },
})
