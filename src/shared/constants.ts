import os from "node:os";
import path from "node:path";
import type { AppConfig } from "./types.js";

export const APP_NAME = "chzzk-recorder";
export const DB_FILE_NAME = "state.db";
export const RUNTIME_FILE_NAME = "runtime.json";
export const BOOTSTRAP_FILE_NAME = "bootstrap.json";

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".config", APP_NAME);
export const DEFAULT_RECORDINGS_DIR = path.join(os.homedir(), "Videos", "ChzzkRecorder");

export const DEFAULT_CONFIG: AppConfig = {
  recordingsDir: DEFAULT_RECORDINGS_DIR,
  fallbackToLocalDir: true,
  fallbackDir: path.resolve("fallback_recordings"),
  recoveryCommand: "",
  recoveryTimeoutSec: 30,
  quality: "best",
  pollIntervalSec: 10,
  probeTimeoutSec: 15,
  stopGraceSec: 10,
  spawnWarnThreshold: 3,
  streamlinkPath: "streamlink",
  liveFilenameTemplate: "[{username}]{stream_started}_{escaped_title}.ts",
  vodFilenameTemplate: "[{username}]{uploaded}_{escaped_title}.ts",
  timeFormat: "yy-MM-dd HH_mm_ss",
  msgTimeFormat: "yy-MM-dd HH:mm:ss",
  controlPort: 0,
  controlToken: "",
  allowedRequesters: [],
  nidAut: "",
  nidSes: "",
  onShutdown: "stop",
  logLevel: "info"
};

export const MIN_POLL_INTERVAL_SEC = 5;

export const CONTROL_HOST = "127.0.0.1";
export const HTTP_API_PREFIX = "/v1";

export const CHZZK_API_BASE = "https://api.chzzk.naver.com/service/v1";
export const CHZZK_WEB_BASE = "https://chzzk.naver.com";

export const NOTIFICATION_BACKLOG = 256;
export const SUBSCRIBER_HIGH_WATERMARK = 1024 * 1024;
