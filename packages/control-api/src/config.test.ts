import { describe, expect, it } from "vitest";
import { config } from "./config.js";

const base = {
  APP_ENV: "test",
  DATABASE_URL: "postgres://localhost/slipway_test",
  GITHUB_WEBHOOK_SECRET: "test-secret",
  API_TOKEN: "test-token",
};

describe("config", () => {
  it("applies defaults", () => {
    const parsed = config.parse(base);
    expect(parsed.PORT).toBe(8080);
    expect(parsed.BUILD_WORKERS).toBe(3);
    expect(parsed.WEBHOOK_RATE_LIMIT).toBe(10);
    expect(parsed.WEBHOOK_RATE_WINDOW_MS).toBe(60_000);
  });

  it.each(["GITHUB_WEBHOOK_SECRET", "API_TOKEN"])("rejects an empty %s", (key) => {
    const result = config.safeParse({ ...base, [key]: "" });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual([key]);
  });
});
