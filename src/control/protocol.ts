import { z } from "zod";
import type { Channel, ChannelListEntry, DownloadJob } from "../shared/types.js";
import {
  AlreadyExistsError,
  AppError,
  NotFoundError,
  ProbeError,
  UnauthorizedError,
  ValidationError
} from "../shared/errors.js";

const requester = z.string().trim().min(1).optional();

export const controlCommandSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("add_channel"),
    channelId: z.string().trim().min(1),
    requester
  }),
  z.object({
    type: z.literal("remove_channel"),
    channelId: z.string().trim().min(1),
    requester
  }),
  z.object({
    type: z.literal("list_channels"),
    requester
  }),
  z.object({
    type: z.literal("download_vod"),
    url: z.string().trim().min(1),
    quality: z.string().trim().min(1).optional(),
    requester
  })
]);

export type ControlCommand = z.infer<typeof controlCommandSchema>;

export type ControlErrorKind =
  | "already_exists"
  | "not_found"
  | "unknown_channel"
  | "validation"
  | "unauthorized"
  | "unavailable"
  | "internal";

export type ControlResponse =
  | { type: "ack"; message: string; channel?: Channel; job?: DownloadJob }
  | { type: "channel_list"; channels: ChannelListEntry[] }
  | { type: "error"; kind: ControlErrorKind; message: string };

/** Raised when an added id does not name an existing Chzzk channel. */
export class UnknownChannelError extends AppError {
  constructor(message: string) {
    super(message, "UNKNOWN_CHANNEL");
    this.name = "UnknownChannelError";
  }
}

export function decodeCommand(input: unknown): ControlCommand {
  const parsed = controlCommandSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ValidationError(`Invalid command: ${details}`);
  }
  return parsed.data;
}

export function errorResponse(error: unknown): Extract<ControlResponse, { type: "error" }> {
  return {
    type: "error",
    kind: errorKindOf(error),
    message: error instanceof Error ? error.message : String(error)
  };
}

export function errorKindOf(error: unknown): ControlErrorKind {
  if (error instanceof AlreadyExistsError) {
    return "already_exists";
  }
  if (error instanceof NotFoundError) {
    return "not_found";
  }
  if (error instanceof UnknownChannelError) {
    return "unknown_channel";
  }
  if (error instanceof ValidationError) {
    return "validation";
  }
  if (error instanceof UnauthorizedError) {
    return "unauthorized";
  }
  if (error instanceof ProbeError) {
    return "unavailable";
  }
  return "internal";
}

export function httpStatusFor(response: ControlResponse): number {
  if (response.type !== "error") {
    return 200;
  }
  switch (response.kind) {
    case "already_exists":
      return 409;
    case "not_found":
    case "unknown_channel":
      return 404;
    case "validation":
      return 400;
    case "unauthorized":
      return 403;
    case "unavailable":
      return 503;
    case "internal":
      return 500;
    default: {
      const _exhaustive: never = response.kind;
      return _exhaustive;
    }
  }
}

/** Accepts a bare channel id or a chzzk.naver.com channel/live URL. */
export function normalizeChannelInput(input: string): string {
  const trimmed = input.trim();
  const match = /^https?:\/\/chzzk\.naver\.com\/(?:live\/)?([0-9a-f]{32})\/?$/i.exec(trimmed);
  const id = match?.[1] ?? trimmed;
  if (!/^[0-9a-f]{32}$/i.test(id)) {
    throw new ValidationError(`Invalid Chzzk channel id: ${input}`);
  }
  return id.toLowerCase();
}
