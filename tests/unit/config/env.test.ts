import { describe, it, expect } from "vitest";

import { loadEnv } from "../../../config/env";

describe("config/env", () => {
  it("should fall back to defaults", () => {
    const env = loadEnv({});

    expect(env.PORT).toBe(3000);
    expect(env.DATABASE_SSL).toBe(false);
    expect(env.SOURCE_TIMEOUT_MS).toBe(30_000);
    expect(env.GDP_PER_CAPITA_PROXY).toBe(1500);
    expect(env.EXCHANGE_RATE_API_URL).toBe("https://open.er-api.com/v6/latest/USD");
    expect(env.SUMMARY_IMAGE_PATH.endsWith("summary.png")).toBe(true);
  });

  it("should coerce numeric and boolean settings", () => {
    const env = loadEnv({
      PORT: "8080",
      DATABASE_SSL: "true",
      SOURCE_TIMEOUT_MS: "2500",
      GDP_PER_CAPITA_PROXY: "1200.5",
    });

    expect(env.PORT).toBe(8080);
    expect(env.DATABASE_SSL).toBe(true);
    expect(env.SOURCE_TIMEOUT_MS).toBe(2500);
    expect(env.GDP_PER_CAPITA_PROXY).toBe(1200.5);
  });

  it("should name every invalid setting", () => {
    expect(() => loadEnv({ PORT: "zero", LOG_LEVEL: "loud" })).toThrow(
      /Invalid environment configuration: PORT: .*; LOG_LEVEL: /
    );
  });
});
