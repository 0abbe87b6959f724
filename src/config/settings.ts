import { DEFAULT_CONFIG, MIN_POLL_INTERVAL_SEC } from "../shared/constants.js";
import type { AppConfig, ConfigKey, LogLevel, ShutdownPolicy } from "../shared/types.js";
import { ConfigError, ValidationError, type ConfigIssue } from "../shared/errors.js";
import { resolveUserPath } from "../utils/path.js";
import { LIVE_PLACEHOLDERS, VOD_PLACEHOLDERS, findUnknownPlaceholders, formatTime } from "../core/filename.js";

export const CONFIG_KEYS: (keyof AppConfig)[] = [
  "recordingsDir",
  "fallbackToLocalDir",
  "fallbackDir",
  "recoveryCommand",
  "recoveryTimeoutSec",
  "quality",
  "pollIntervalSec",
  "probeTimeoutSec",
  "stopGraceSec",
  "spawnWarnThreshold",
  "streamlinkPath",
  "liveFilenameTemplate",
  "vodFilenameTemplate",
  "timeFormat",
  "msgTimeFormat",
  "controlPort",
  "controlToken",
  "allowedRequesters",
  "nidAut",
  "nidSes",
  "onShutdown",
  "logLevel"
];

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];
const SHUTDOWN_POLICIES: ShutdownPolicy[] = ["stop", "detach"];
const QUALITY_REGEX = /^[A-Za-z0-9_,+-]+$/;

type ConfigParsers = { [K in keyof AppConfig]: (value: string) => AppConfig[K] };

const PARSERS: ConfigParsers = {
  recordingsDir: (value) => parsePath("recordingsDir", value),
  fallbackToLocalDir: (value) => parseBool("fallbackToLocalDir", value),
  fallbackDir: (value) => parsePath("fallbackDir", value),
  recoveryCommand: (value) => value.trim(),
  recoveryTimeoutSec: (value) => parseIntAtLeast("recoveryTimeoutSec", value, 1),
  quality: (value) => parseQuality(value),
  pollIntervalSec: (value) => parseIntAtLeast("pollIntervalSec", value, MIN_POLL_INTERVAL_SEC),
  probeTimeoutSec: (value) => parseIntAtLeast("probeTimeoutSec", value, 1),
  stopGraceSec: (value) => parseIntAtLeast("stopGraceSec", value, 1),
  spawnWarnThreshold: (value) => parseIntAtLeast("spawnWarnThreshold", value, 1),
  streamlinkPath: (value) => parseNonEmpty("streamlinkPath", value),
  liveFilenameTemplate: (value) => parseTemplate("liveFilenameTemplate", value, LIVE_PLACEHOLDERS),
  vodFilenameTemplate: (value) => parseTemplate("vodFilenameTemplate", value, VOD_PLACEHOLDERS),
  timeFormat: (value) => parseTimeFormat("timeFormat", value),
  msgTimeFormat: (value) => parseTimeFormat("msgTimeFormat", value),
  controlPort: (value) => {
    const parsed = parseIntAtLeast("controlPort", value, 0);
    if (parsed > 65535) {
      throw new ValidationError("controlPort must be an integer between 0 and 65535");
    }
    return parsed;
  },
  controlToken: (value) => value.trim(),
  allowedRequesters: (value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean),
  nidAut: (value) => value.trim(),
  nidSes: (value) => value.trim(),
  onShutdown: (value) => {
    const found = SHUTDOWN_POLICIES.find((policy) => policy === value.trim());
    if (!found) {
      throw new ValidationError(`onShutdown must be one of: ${SHUTDOWN_POLICIES.join(", ")}`);
    }
    return found;
  },
  logLevel: (value) => {
    const found = LOG_LEVELS.find((level) => level === value.trim());
    if (!found) {
      throw new ValidationError(`logLevel must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    return found;
  }
};

export function parseConfigValue<K extends keyof AppConfig>(key: K, value: string): AppConfig[K] {
  return PARSERS[key](value);
}

export function stringifyConfigValue<K extends keyof AppConfig>(key: K, value: AppConfig[K]): string {
  if (Array.isArray(value)) {
    return value.join(",");
  }
  return String(value);
}

export function configKeyFromInput(key: string): ConfigKey {
  if (key === "configDir") {
    return key;
  }

  const found = CONFIG_KEYS.find((candidate) => candidate === key);
  if (found) {
    return found;
  }

  throw new ValidationError(`Unknown config key: ${key}`);
}

/**
 * Builds the effective config from stored raw values. Every invalid value is
 * collected so the caller sees all of them in one ConfigError.
 */
export function mergeConfig(raw: Partial<Record<keyof AppConfig, string>>): AppConfig {
  const issues: ConfigIssue[] = [];

  const read = <K extends keyof AppConfig>(key: K): AppConfig[K] => {
    const value = raw[key];
    if (value === undefined) {
      return DEFAULT_CONFIG[key];
    }
    try {
      return parseConfigValue(key, value);
    } catch (error) {
      if (error instanceof ValidationError) {
        issues.push({ key, message: error.message });
        return DEFAULT_CONFIG[key];
      }
      throw error;
    }
  };

  const config: AppConfig = {
    recordingsDir: read("recordingsDir"),
    fallbackToLocalDir: read("fallbackToLocalDir"),
    fallbackDir: read("fallbackDir"),
    recoveryCommand: read("recoveryCommand"),
    recoveryTimeoutSec: read("recoveryTimeoutSec"),
    quality: read("quality"),
    pollIntervalSec: read("pollIntervalSec"),
    probeTimeoutSec: read("probeTimeoutSec"),
    stopGraceSec: read("stopGraceSec"),
    spawnWarnThreshold: read("spawnWarnThreshold"),
    streamlinkPath: read("streamlinkPath"),
    liveFilenameTemplate: read("liveFilenameTemplate"),
    vodFilenameTemplate: read("vodFilenameTemplate"),
    timeFormat: read("timeFormat"),
    msgTimeFormat: read("msgTimeFormat"),
    controlPort: read("controlPort"),
    controlToken: read("controlToken"),
    allowedRequesters: read("allowedRequesters"),
    nidAut: read("nidAut"),
    nidSes: read("nidSes"),
    onShutdown: read("onShutdown"),
    logLevel: read("logLevel")
  };

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return config;
}

export function parseBool(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  throw new ValidationError(`${key} must be a boolean (true/false)`);
}

export function parseQuality(value: string): string {
  const trimmed = value.trim();
  if (!QUALITY_REGEX.test(trimmed)) {
    throw new ValidationError("quality must be a streamlink stream name such as best, 1080p or 720p,best");
  }
  return trimmed;
}

function parsePath(key: string, value: string): string {
  if (!value.trim()) {
    throw new ValidationError(`${key} cannot be empty`);
  }
  return resolveUserPath(value.trim());
}

function parseNonEmpty(key: string, value: string): string {
  if (!value.trim()) {
    throw new ValidationError(`${key} cannot be empty`);
  }
  return value.trim();
}

function parseIntAtLeast(key: string, value: string, min: number): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ValidationError(`${key} must be an integer >= ${min}`);
  }
  return parsed;
}

function parseTemplate(key: string, value: string, known: readonly string[]): string {
  if (!value.trim()) {
    throw new ValidationError(`${key} cannot be empty`);
  }
  const unknown = findUnknownPlaceholders(value, known);
  if (unknown.length > 0) {
    throw new ValidationError(
      `${key} has unknown placeholder(s) ${unknown.map((name) => `{${name}}`).join(", ")}; allowed: ${known.map((name) => `{${name}}`).join(", ")}`
    );
  }
  return value;
}

function parseTimeFormat(key: string, value: string): string {
  if (!value) {
    throw new ValidationError(`${key} cannot be empty`);
  }
  try {
    formatTime(new Date(0), value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`${key} is not a valid date-fns format: ${reason}`);
  }
  return value;
}
