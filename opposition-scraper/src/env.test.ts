import { describe, it, expect } from "vitest";
import { loadConfig } from "./env";
import { ConfigError } from "./errors";

const credentials = { GEMINI_API_KEY: "test-gemini-key", BRIGHTDATA_SERP_API_KEY: "test-serp-key" };

describe("loadConfig", () => {
  it("fails when a credential is missing", () => {
    let caught: unknown;
    try {
      loadConfig({ GEMINI_API_KEY: "test-gemini-key", BRIGHTDATA_SERP_API_KEY: "" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.missing).toEqual(["BRIGHTDATA_SERP_API_KEY"]);
  });

  it("applies defaults", () => {
    const config = loadConfig(credentials);
    expect(config).toMatchObject({
      geminiModel: "gemini-2.0-flash-exp",
      serpZone: "serp",
      dataDir: "data",
      projectsCsv: "data/projects.csv",
      timeoutMs: 30000,
      fetchDelayMs: 2000,
      searchDelayMs: 1000,
      batchConcurrency: 1,
      resume: false,
      port: 3333,
    });
  });

  it("reads overrides from strings", () => {
    const config = loadConfig({ ...credentials, FETCH_DELAY_MS: "0", RESUME: "1", DATA_DIR: "/tmp/out" });
    expect(config.fetchDelayMs).toBe(0);
    expect(config.resume).toBe(true);
    expect(config.dataDir).toBe("/tmp/out");
  });

  it("rejects a non-numeric setting", () => {
    expect(() => loadConfig({ ...credentials, BATCH_CONCURRENCY: "many" })).toThrow(ConfigError);
  });
});
