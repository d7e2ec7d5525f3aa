import { defineConfig } from "vitest/config";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

// Load .env.test before config is processed
const envPath = resolve(dirname(fileURLToPath(import.meta.url)), ".env.test");
const envContent = readFileSync(envPath, "utf-8");
envContent.split("\n").forEach((line) => {
  const [key, ...valueParts] = line.split("=");
  if (key && !key.startsWith("#")) {
    const value = valueParts.join("=").replace(/^["']|["']$/g, "");
    process.env[key.trim()] = value.trim();
  }
});

export default defineConfig({
  test: {
    environment: "node",
    // Unit tests plus in-process integration against mock-wls (no sockets)
    include: ["src/__tests__/**/*.test.ts"],
  },
});
