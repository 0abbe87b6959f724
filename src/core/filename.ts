import { format, isValid, parse } from "date-fns";
import { toDirName } from "../utils/path.js";

export const LIVE_PLACEHOLDERS = ["username", "stream_started", "record_started", "escaped_title"] as const;
export const VOD_PLACEHOLDERS = ["username", "stream_started", "download_started", "uploaded", "escaped_title"] as const;

export type LivePlaceholder = (typeof LIVE_PLACEHOLDERS)[number];
export type VodPlaceholder = (typeof VOD_PLACEHOLDERS)[number];

const PLACEHOLDER_REGEX = /\{([A-Za-z0-9_]+)\}/g;
const ILLEGAL_FILENAME_CHARS = /[/\\?%*:|"<>.{}\r\n]/g;
const MAX_TITLE_LENGTH = 77;

/**
 * Replaces every `{name}` with its value. Placeholders without a value are
 * kept verbatim; templates are checked against the known names when the
 * configuration is loaded.
 */
export function renderTemplate(template: string, values: Partial<Record<string, string>>): string {
  return template.replace(PLACEHOLDER_REGEX, (match, name: string) => values[name] ?? match);
}

export function findUnknownPlaceholders(template: string, known: readonly string[]): string[] {
  const unknown: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_REGEX)) {
    const name = match[1];
    if (name !== undefined && !known.includes(name) && !unknown.includes(name)) {
      unknown.push(name);
    }
  }
  return unknown;
}

export function escapeTitle(title: string): string {
  const escaped = title.replace(ILLEGAL_FILENAME_CHARS, "_");
  return escaped.length > MAX_TITLE_LENGTH ? `${escaped.slice(0, 75)}..` : escaped;
}

export function formatTime(date: Date, pattern: string): string {
  return format(date, pattern);
}

/** Parses the `yyyy-MM-dd HH:mm:ss` timestamps the Chzzk API returns. */
export function parseChzzkDate(value: string): Date | null {
  const parsed = parse(value, "yyyy-MM-dd HH:mm:ss", new Date());
  return isValid(parsed) ? parsed : null;
}

export function buildLiveFileName(input: {
  template: string;
  timeFormat: string;
  username: string;
  title: string;
  streamStartedAt: Date;
  recordStartedAt: Date;
}): string {
  const values: Record<LivePlaceholder, string> = {
    username: toDirName(input.username),
    stream_started: formatTime(input.streamStartedAt, input.timeFormat),
    record_started: formatTime(input.recordStartedAt, input.timeFormat),
    escaped_title: escapeTitle(input.title)
  };
  return renderTemplate(input.template, values);
}

export function buildVodFileName(input: {
  template: string;
  timeFormat: string;
  username: string;
  title: string;
  streamStartedAt: Date | null;
  downloadStartedAt: Date;
  uploadedAt: Date;
}): string {
  const values: Record<VodPlaceholder, string> = {
    username: toDirName(input.username),
    // VODs that were never a live broadcast fall back to their upload time
    stream_started: formatTime(input.streamStartedAt ?? input.uploadedAt, input.timeFormat),
    download_started: formatTime(input.downloadStartedAt, input.timeFormat),
    uploaded: formatTime(input.uploadedAt, input.timeFormat),
    escaped_title: escapeTitle(input.title)
  };
  return renderTemplate(input.template, values);
}
