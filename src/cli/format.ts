import type { NotificationEvent } from "../shared/events.js";
import type { ChannelListEntry } from "../shared/types.js";
import type { ControlResponse } from "../control/protocol.js";
import { formatTime } from "../core/filename.js";

export function formatBytes(size: number): string {
  if (size > 1024 ** 3) {
    return `${(size / 1024 ** 3).toFixed(1)} GB`;
  }
  if (size > 1024 ** 2) {
    return `${(size / 1024 ** 2).toFixed(1)} MB`;
  }
  if (size > 1024) {
    return `${(size / 1024).toFixed(1)} KB`;
  }
  return `${size} Bytes`;
}

export function formatDuration(totalSec: number): string {
  const hours = Math.floor(totalSec / 3600);
  const minutes = Math.floor((totalSec % 3600) / 60);
  const seconds = totalSec % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}

/** One line per notification, as printed by `chzr watch`. */
export function formatNotification(event: NotificationEvent, timeFormat: string): string {
  const at = formatTime(new Date(event.at), timeFormat);
  switch (event.type) {
    case "recording_started":
      return `[${at}] Recording started: ${event.displayName} "${event.title}" -> ${event.outputPath}`;
    case "recording_stopped": {
      const size = event.fileSizeBytes === null ? "file missing" : formatBytes(event.fileSizeBytes);
      const how = event.forced ? "stopped" : "done";
      return `[${at}] Recording ${how}: ${event.displayName} (${formatDuration(event.durationSec)}, ${size}) ${event.outputPath}`;
    }
    case "download_completed": {
      const size = event.fileSizeBytes === null ? "" : ` (${formatBytes(event.fileSizeBytes)})`;
      return `[${at}] Download completed: ${event.sourceUrl} -> ${event.outputPath}${size}`;
    }
    case "download_failed":
      return `[${at}] Download failed: ${event.sourceUrl}: ${event.reason}`;
    case "warning":
      return `[${at}] Warning: ${event.message}`;
    case "heartbeat":
      return `[${at}] alive`;
    default: {
      const _exhaustive: never = event;
      return _exhaustive;
    }
  }
}

export function formatChannelList(channels: ChannelListEntry[]): string {
  if (channels.length === 0) {
    return "No channels added";
  }
  const lines = channels.map((channel) => {
    const marker = channel.state === "recording" ? "[REC] " : channel.state === "live" ? "[LIVE] " : "";
    return `${marker}${channel.displayName} (${channel.id})`;
  });
  return [`Checking/recording ${channels.length} channel(s):`, ...lines].join("\n");
}

/** Exit code for a control response: 0 on success, 2 for caller errors, 1 otherwise. */
export function describeResponse(response: ControlResponse): { text: string; exitCode: number } {
  switch (response.type) {
    case "ack":
      return { text: response.job ? `${response.message} (job ${response.job.id})` : response.message, exitCode: 0 };
    case "channel_list":
      return { text: formatChannelList(response.channels), exitCode: 0 };
    case "error":
      return {
        text: `${response.kind}: ${response.message}`,
        exitCode: response.kind === "internal" || response.kind === "unavailable" ? 1 : 2
      };
    default: {
      const _exhaustive: never = response;
      return _exhaustive;
    }
  }
}
