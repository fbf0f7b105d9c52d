import { describe, expect, it } from "vitest";

import { loadConfig } from "../../src/utils/config";
import { ConfigError } from "../../src/utils/errors";
import { DEFAULT_SETTINGS } from "../../src/models/settings.model";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.settings).toEqual(DEFAULT_SETTINGS);
    expect(config.stateFile).toBe("asset_sync_state.json");
    expect(config.verifyAfterDownload).toBe(false);
    expect(config.manifestPath).toBeUndefined();
    expect(config.outputDir).toBeUndefined();
  });

  it("converts environment strings to typed settings", () => {
    const config = loadConfig({
      ASSET_BASE_URL: "http://assets.example.test/cdn/",
      CONCURRENT_REQUESTS: "12",
      ENABLE_RESUME: "false",
      CACHE_SAMPLE_RATIO: "0.1",
      VERIFY_AFTER_DOWNLOAD: "true",
      MANIFEST_PATH: "manifest.json",
      OUTPUT_DIR: "downloads",
    });

    expect(config.settings.assetBaseUrl).toBe("http://assets.example.test/cdn");
    expect(config.settings.concurrentRequests).toBe(12);
    expect(config.settings.enableResume).toBe(false);
    expect(config.settings.cacheSampleRatio).toBe(0.1);
    expect(config.verifyAfterDownload).toBe(true);
    expect(config.manifestPath).toBe("manifest.json");
    expect(config.outputDir).toBe("downloads");
  });

  it("rejects values that fail validation", () => {
    expect(() => loadConfig({ CONCURRENT_REQUESTS: "lots" })).toThrow(ConfigError);
    expect(() => loadConfig({ ASSET_BASE_URL: "ftp://example.test" })).toThrow(ConfigError);
    expect(() => loadConfig({ CACHE_SAMPLE_RATIO: "0" })).toThrow(ConfigError);
  });

  it("requires the incremental threshold to stay below the reliable one", () => {
    expect(() =>
      loadConfig({ RELIABLE_THRESHOLD: "0.9", INCREMENTAL_THRESHOLD: "0.95" }),
    ).toThrow(/INCREMENTAL_THRESHOLD must not exceed RELIABLE_THRESHOLD/);
  });
});
