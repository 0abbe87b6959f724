import { z } from "zod";
import { CHZZK_API_BASE } from "../shared/constants.js";
import { ProbeError } from "../shared/errors.js";
import type { ChannelInfo, LiveStatus, VideoInfo } from "../shared/types.js";
import { parseChzzkDate } from "../core/filename.js";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const VIDEO_URL_REGEX = /^https:\/\/chzzk\.naver\.com\/video\/(\d+)\/?$/;

const envelopeSchema = <T extends z.ZodTypeAny>(content: T) =>
  z.object({
    code: z.number().optional(),
    content
  });

const channelSchema = envelopeSchema(
  z
    .object({
      channelId: z.string().nullable(),
      channelName: z.string().nullable()
    })
    .nullable()
);

const liveDetailSchema = envelopeSchema(
  z
    .object({
      status: z.string(),
      liveTitle: z.string().nullable().optional(),
      openDate: z.string().nullable().optional()
    })
    .nullable()
);

const videoSchema = envelopeSchema(
  z
    .object({
      videoNo: z.number(),
      videoTitle: z.string(),
      publishDate: z.string(),
      liveOpenDate: z.string().nullable().optional(),
      channel: z.object({
        channelName: z.string()
      })
    })
    .nullable()
);

export interface ChzzkApiOptions {
  timeoutSec: number;
  nidAut?: string;
  nidSes?: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export interface ChannelDirectory {
  getChannelInfo(channelId: string): Promise<ChannelInfo | null>;
}

export interface VideoCatalog {
  getVideo(videoUrl: string): Promise<VideoInfo | null>;
}

export function parseVideoUrl(videoUrl: string): number | null {
  const match = VIDEO_URL_REGEX.exec(videoUrl.trim());
  if (!match?.[1]) {
    return null;
  }
  return Number.parseInt(match[1], 10);
}

export class ChzzkApi implements ChannelDirectory, VideoCatalog {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: ChzzkApiOptions) {
    this.baseUrl = options.baseUrl ?? CHZZK_API_BASE;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  /** Returns null when the id does not name an existing channel. */
  async getChannelInfo(channelId: string): Promise<ChannelInfo | null> {
    const body = await this.getJson(`/channels/${encodeURIComponent(channelId)}`, channelSchema);
    if (!body?.content?.channelId || !body.content.channelName) {
      return null;
    }
    return {
      channelId: body.content.channelId,
      channelName: body.content.channelName
    };
  }

  async checkLive(channelId: string): Promise<LiveStatus> {
    const body = await this.getJson(`/channels/${encodeURIComponent(channelId)}/live-detail`, liveDetailSchema);
    if (!body) {
      throw new ProbeError(`Channel ${channelId} has no live detail`);
    }

    const content = body.content;
    if (!content || content.status !== "OPEN") {
      return { live: false };
    }

    const startedAt = content.openDate ? parseChzzkDate(content.openDate) : null;
    return {
      live: true,
      title: content.liveTitle ?? "",
      startedAt: startedAt ?? this.now()
    };
  }

  async getVideo(videoUrl: string): Promise<VideoInfo | null> {
    const videoNo = parseVideoUrl(videoUrl);
    if (videoNo === null) {
      return null;
    }

    const body = await this.getJson(`/videos/${videoNo}`, videoSchema);
    const content = body?.content;
    if (!content) {
      return null;
    }

    return {
      videoNo: content.videoNo,
      title: content.videoTitle,
      channelName: content.channel.channelName,
      publishedAt: parseChzzkDate(content.publishDate) ?? this.now(),
      liveStartedAt: content.liveOpenDate ? parseChzzkDate(content.liveOpenDate) : null
    };
  }

  /** 404 maps to null; every other failure is a ProbeError. */
  private async getJson<T extends z.ZodTypeAny>(pathname: string, schema: T): Promise<z.infer<T> | null> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${pathname}`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(this.options.timeoutSec * 1000)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProbeError(`Request to ${pathname} failed: ${reason}`, error);
    }

    if (response.status === 404) {
      return null;
    }

    if (!response.ok) {
      throw new ProbeError(`Request to ${pathname} failed with HTTP ${response.status}`);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new ProbeError(`Response from ${pathname} is not JSON`, error);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ProbeError(`Unexpected response from ${pathname}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": USER_AGENT,
      Accept: "application/json"
    };
    if (this.options.nidAut && this.options.nidSes) {
      headers.Cookie = `NID_AUT=${this.options.nidAut}; NID_SES=${this.options.nidSes}`;
    }
    return headers;
  }
}
