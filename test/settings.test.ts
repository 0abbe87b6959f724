import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { configKeyFromInput, mergeConfig, parseConfigValue, stringifyConfigValue } from "../src/config/settings.js";
import { DEFAULT_CONFIG } from "../src/shared/constants.js";
import { ConfigError, ValidationError } from "../src/shared/errors.js";

describe("boolean config", () => {
  it("parses common true values", () => {
    expect(parseConfigValue("fallbackToLocalDir", "true")).toBe(true);
    expect(parseConfigValue("fallbackToLocalDir", "1")).toBe(true);
    expect(parseConfigValue("fallbackToLocalDir", "yes")).toBe(true);
    expect(parseConfigValue("fallbackToLocalDir", "ON")).toBe(true);
  });

  it("parses common false values", () => {
    expect(parseConfigValue("fallbackToLocalDir", "false")).toBe(false);
    expect(parseConfigValue("fallbackToLocalDir", "0")).toBe(false);
    expect(parseConfigValue("fallbackToLocalDir", "no")).toBe(false);
    expect(parseConfigValue("fallbackToLocalDir", "off")).toBe(false);
  });

  it("rejects invalid values", () => {
    expect(() => parseConfigValue("fallbackToLocalDir", "maybe")).toThrow(ValidationError);
  });
});

describe("config values", () => {
  it("enforces the minimum poll interval", () => {
    expect(parseConfigValue("pollIntervalSec", "5")).toBe(5);
    expect(() => parseConfigValue("pollIntervalSec", "4")).toThrow("pollIntervalSec must be an integer >= 5");
    expect(() => parseConfigValue("pollIntervalSec", "7.5")).toThrow(ValidationError);
  });

  it("rejects templates with unknown placeholders", () => {
    expect(parseConfigValue("vodFilenameTemplate", "{uploaded}_{escaped_title}.ts")).toBe("{uploaded}_{escaped_title}.ts");
    expect(() => parseConfigValue("liveFilenameTemplate", "{uploaded}.ts")).toThrow(/unknown placeholder\(s\) \{uploaded\}/);
  });

  it("rejects time formats date-fns cannot render", () => {
    expect(() => parseConfigValue("timeFormat", "yy-MM-dd nn")).toThrow(ValidationError);
  });

  it("expands the home directory in paths", () => {
    expect(parseConfigValue("recordingsDir", "~/Videos")).toBe(path.join(os.homedir(), "Videos"));
  });

  it("splits the requester allow list", () => {
    const parsed = parseConfigValue("allowedRequesters", "alice, bob,,carol");
    expect(parsed).toEqual(["alice", "bob", "carol"]);
    expect(stringifyConfigValue("allowedRequesters", parsed)).toBe("alice,bob,carol");
  });

  it("limits the control port range", () => {
    expect(parseConfigValue("controlPort", "8787")).toBe(8787);
    expect(() => parseConfigValue("controlPort", "70000")).toThrow(ValidationError);
  });
});

describe("mergeConfig", () => {
  it("uses defaults for missing values", () => {
    expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("uses stored values", () => {
    const config = mergeConfig({ pollIntervalSec: "30", onShutdown: "detach" });
    expect(config.pollIntervalSec).toBe(30);
    expect(config.onShutdown).toBe("detach");
  });

  it("reports every invalid value at once", () => {
    let caught: unknown;
    try {
      mergeConfig({ pollIntervalSec: "1", quality: "best", liveFilenameTemplate: "{nope}.ts", logLevel: "loud" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues.map((issue) => issue.key) : [];
    expect(issues).toEqual(["pollIntervalSec", "liveFilenameTemplate", "logLevel"]);
  });
});

describe("configKeyFromInput", () => {
  it("accepts known keys and configDir", () => {
    expect(configKeyFromInput("quality")).toBe("quality");
    expect(configKeyFromInput("configDir")).toBe("configDir");
  });

  it("rejects unknown keys", () => {
    expect(() => configKeyFromInput("postprocess")).toThrow("Unknown config key: postprocess");
  });
});
