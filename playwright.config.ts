import { defineConfig } from "@playwright/test";

export default defineConfig({
  testDir: "./test",
  testMatch: "**/*.spec.ts",
  workers: process.env.CI ? 1 : 4,
  timeout: 15_000,
  retries: 0,
  fullyParallel: true,
  reporter: [["list"]],
});
