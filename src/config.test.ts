import { describe, it, expect } from "vitest";
import { loadEnvConfig } from "./config.js";

describe("loadEnvConfig", () => {
  it("prefers the API_KEY and API_SECRET names", () => {
    const config = loadEnvConfig({
      REDIS_CLOUD_API_KEY: "test-key",
      REDIS_CLOUD_ACCOUNT_KEY: "other-key",
      REDIS_CLOUD_API_SECRET: "test-secret",
      REDIS_CLOUD_USER_KEY: "other-secret",
    });

    expect(config).toEqual({ apiKey: "test-key", apiSecret: "test-secret" });
  });

  it("falls back to the alternative names", () => {
    const config = loadEnvConfig({
      REDIS_CLOUD_ACCOUNT_KEY: "account-key",
      REDIS_CLOUD_USER_KEY: "user-secret",
    });

    expect(config).toEqual({ apiKey: "account-key", apiSecret: "user-secret" });
  });

  it("takes SECRET_KEY before USER_KEY", () => {
    const config = loadEnvConfig({
      REDIS_CLOUD_API_KEY: "test-key",
      REDIS_CLOUD_SECRET_KEY: "secret-key",
      REDIS_CLOUD_USER_KEY: "user-key",
    });

    expect(config.apiSecret).toBe("secret-key");
  });

  it("treats blank values as unset", () => {
    const config = loadEnvConfig({
      REDIS_CLOUD_API_KEY: "  ",
      REDIS_CLOUD_ACCOUNT_KEY: "account-key",
      REDIS_CLOUD_API_SECRET: "test-secret",
      REDIS_CLOUD_BASE_URL: "",
    });

    expect(config).toEqual({ apiKey: "account-key", apiSecret: "test-secret" });
  });

  it("reads an optional base URL", () => {
    const config = loadEnvConfig({
      REDIS_CLOUD_API_KEY: "test-key",
      REDIS_CLOUD_API_SECRET: "test-secret",
      REDIS_CLOUD_BASE_URL: "http://localhost:8080/v1",
    });

    expect(config.baseUrl).toBe("http://localhost:8080/v1");
  });

  it("names the variables to set when the key is missing", () => {
    expect(() => loadEnvConfig({ REDIS_CLOUD_API_SECRET: "test-secret" })).toThrow(
      "API key not found. Set REDIS_CLOUD_API_KEY or REDIS_CLOUD_ACCOUNT_KEY"
    );
  });

  it("names the variable to set when the secret is missing", () => {
    expect(() => loadEnvConfig({ REDIS_CLOUD_API_KEY: "test-key" })).toThrow(
      "API secret not found. Set REDIS_CLOUD_API_SECRET"
    );
  });
});
