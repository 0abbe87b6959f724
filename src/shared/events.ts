export interface RecordingStartedPayload {
  type: "recording_started";
  channelId: string;
  displayName: string;
  title: string;
  outputPath: string;
  streamStartedAt: string;
  recordStartedAt: string;
}

export interface RecordingStoppedPayload {
  type: "recording_stopped";
  channelId: string;
  displayName: string;
  outputPath: string;
  recordStartedAt: string;
  durationSec: number;
  exitCode: number | null;
  signal: string | null;
  fileSizeBytes: number | null;
  forced: boolean;
}

export interface DownloadCompletedPayload {
  type: "download_completed";
  jobId: string;
  sourceUrl: string;
  outputPath: string;
  fileSizeBytes: number | null;
}

export interface DownloadFailedPayload {
  type: "download_failed";
  jobId: string;
  sourceUrl: string;
  outputPath: string | null;
  reason: string;
}

export interface WarningPayload {
  type: "warning";
  channelId?: string;
  message: string;
}

export interface HeartbeatPayload {
  type: "heartbeat";
}

export type NotificationPayload =
  | RecordingStartedPayload
  | RecordingStoppedPayload
  | DownloadCompletedPayload
  | DownloadFailedPayload
  | WarningPayload
  | HeartbeatPayload;

export type NotificationEvent = NotificationPayload & {
  seq: number;
  at: string;
};

export interface NotificationSink {
  publish(payload: NotificationPayload): NotificationEvent;
}
