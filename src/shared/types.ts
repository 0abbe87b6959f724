export type LogLevel = "debug" | "info" | "warn" | "error";

export type ShutdownPolicy = "stop" | "detach";

export interface AppConfig {
  recordingsDir: string;
  fallbackToLocalDir: boolean;
  fallbackDir: string;
  recoveryCommand: string;
  recoveryTimeoutSec: number;
  quality: string;
  pollIntervalSec: number;
  probeTimeoutSec: number;
  stopGraceSec: number;
  spawnWarnThreshold: number;
  streamlinkPath: string;
  liveFilenameTemplate: string;
  vodFilenameTemplate: string;
  timeFormat: string;
  msgTimeFormat: string;
  controlPort: number;
  controlToken: string;
  allowedRequesters: string[];
  nidAut: string;
  nidSes: string;
  onShutdown: ShutdownPolicy;
  logLevel: LogLevel;
}

export type ConfigKey = keyof AppConfig | "configDir";

export interface Channel {
  id: string;
  displayName: string;
  addedAt: string;
}

/** `live` is the transient state between detecting a broadcast and a capture process actually running. */
export type ChannelState = "idle" | "live" | "recording";

export interface ChannelListEntry extends Channel {
  state: ChannelState;
}

export type LiveStatus =
  | { live: false }
  | {
      live: true;
      title: string;
      startedAt: Date;
    };

export interface ChannelInfo {
  channelId: string;
  channelName: string;
}

export interface VideoInfo {
  videoNo: number;
  title: string;
  channelName: string;
  publishedAt: Date;
  liveStartedAt: Date | null;
}

export type DownloadStatus = "running" | "succeeded" | "failed";

export interface DownloadJob {
  id: string;
  sourceUrl: string;
  quality: string;
  outputPath: string | null;
  pid: number | null;
  status: DownloadStatus;
  startedAt: string;
  endedAt: string | null;
}

export interface RecordingHistoryEntry {
  id: number;
  channelId: string;
  title: string;
  outputPath: string;
  streamStartedAt: string;
  recordStartedAt: string;
  endedAt: string | null;
  exitCode: number | null;
  fileSizeBytes: number | null;
}

export interface DaemonRuntime {
  pid: number;
  port: number;
  token: string;
  startedAt: string;
  configDir: string;
  /** Grace period the daemon gives a capture before SIGKILL; bounds how long a removal can take. */
  stopGraceSec: number;
}

export interface DaemonStatus {
  running: boolean;
  pid?: number;
  port?: number;
  uptimeSec?: number;
  channels: number;
  activeRecordings: number;
  runningDownloads: number;
  nextPollAt?: string;
}

export interface ChannelStats {
  total: number;
}

export interface SessionStats {
  total: number;
  active: number;
  finished: number;
  totalDurationSec: number;
}

export interface DownloadStats {
  total: number;
  succeeded: number;
  failed: number;
}
