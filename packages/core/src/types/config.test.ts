import { describe, it, expect } from "vitest";
import { pyvmConfigSchema, loadConfig, DEFAULT_CONFIG } from "./config.js";

describe("pyvmConfigSchema", () => {
  it("fills every field with its default", () => {
    expect(DEFAULT_CONFIG).toEqual({
      maxRetries: 3,
      retryDelayMs: 2000,
      requestTimeoutMs: 15000,
      downloadTimeoutMs: 120000,
      downloadsPageUrl: "https://www.python.org/downloads/",
      siteOrigin: "https://www.python.org",
    });
  });

  it("rejects zero retries", () => {
    const result = pyvmConfigSchema.safeParse({ maxRetries: 0 });
    expect(result.success).toBe(false);
  });

  it("rejects a negative retry delay", () => {
    const result = pyvmConfigSchema.safeParse({ retryDelayMs: -1 });
    expect(result.success).toBe(false);
  });

  it("rejects a non-integer timeout", () => {
    const result = pyvmConfigSchema.safeParse({ requestTimeoutMs: 1.5 });
    expect(result.success).toBe(false);
  });

  it("rejects a downloads page that is not a URL", () => {
    const result = pyvmConfigSchema.safeParse({ downloadsPageUrl: "python.org" });
    expect(result.success).toBe(false);
  });
});

describe("loadConfig", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({
      PYVM_MAX_RETRIES: "5",
      PYVM_RETRY_DELAY_MS: "0",
      PYVM_REQUEST_TIMEOUT_MS: "3000",
      PYVM_DOWNLOAD_TIMEOUT_MS: "60000",
    });
    expect(config.maxRetries).toBe(5);
    expect(config.retryDelayMs).toBe(0);
    expect(config.requestTimeoutMs).toBe(3000);
    expect(config.downloadTimeoutMs).toBe(60000);
  });

  it("overrides the downloads page", () => {
    const config = loadConfig({ PYVM_DOWNLOADS_URL: "https://mirror.example.com/downloads/" });
    expect(config.downloadsPageUrl).toBe("https://mirror.example.com/downloads/");
    expect(config.siteOrigin).toBe("https://www.python.org");
  });

  it("throws on a malformed variable", () => {
    expect(() => loadConfig({ PYVM_MAX_RETRIES: "many" })).toThrow();
  });
});
