import { describe, expect, it } from "vitest";
import { ChzzkApi, parseVideoUrl } from "../src/chzzk/api.js";
import { ChzzkStatusProber } from "../src/chzzk/prober.js";
import { ProbeError } from "../src/shared/errors.js";
import { CHANNEL_A } from "./helpers/fakes.js";

interface Recorded {
  url: string;
  headers: Record<string, string>;
}

function createApi(reply: (url: string) => { status: number; body?: unknown }, cookies = false) {
  const requests: Recorded[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = String(input);
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({ url, headers });
    const { status, body } = reply(url);
    return new Response(body === undefined ? null : JSON.stringify(body), { status });
  };
  const api = new ChzzkApi({
    timeoutSec: 5,
    baseUrl: "https://api.test/service/v1",
    fetchImpl,
    now: () => new Date(2024, 0, 1, 12, 0, 0),
    ...(cookies ? { nidAut: "test-aut", nidSes: "test-ses" } : {})
  });
  return { api, requests };
}

describe("ChzzkApi.checkLive", () => {
  it("reads an open broadcast", async () => {
    const { api, requests } = createApi(() => ({
      status: 200,
      body: { code: 200, content: { status: "OPEN", liveTitle: "hello", openDate: "2024-01-01 10:00:00" } }
    }));

    expect(await api.checkLive(CHANNEL_A)).toEqual({
      live: true,
      title: "hello",
      startedAt: new Date(2024, 0, 1, 10, 0, 0)
    });
    expect(requests[0]?.url).toBe(`https://api.test/service/v1/channels/${CHANNEL_A}/live-detail`);
  });

  it("treats a closed broadcast or empty content as offline", async () => {
    const closed = createApi(() => ({ status: 200, body: { content: { status: "CLOSE" } } }));
    const empty = createApi(() => ({ status: 200, body: { content: null } }));

    expect(await closed.api.checkLive(CHANNEL_A)).toEqual({ live: false });
    expect(await empty.api.checkLive(CHANNEL_A)).toEqual({ live: false });
  });

  it("uses the current time when the open date is missing", async () => {
    const { api } = createApi(() => ({ status: 200, body: { content: { status: "OPEN", liveTitle: null } } }));

    expect(await api.checkLive(CHANNEL_A)).toEqual({ live: true, title: "", startedAt: new Date(2024, 0, 1, 12, 0, 0) });
  });

  it("fails with ProbeError on HTTP errors and unexpected bodies", async () => {
    const down = createApi(() => ({ status: 503 }));
    const weird = createApi(() => ({ status: 200, body: { content: { state: "OPEN" } } }));

    await expect(down.api.checkLive(CHANNEL_A)).rejects.toThrow(ProbeError);
    await expect(weird.api.checkLive(CHANNEL_A)).rejects.toThrow(ProbeError);
  });

  it("sends the login cookies when configured", async () => {
    const { api, requests } = createApi(() => ({ status: 200, body: { content: null } }), true);

    await api.checkLive(CHANNEL_A);

    expect(requests[0]?.headers.cookie).toBe("NID_AUT=test-aut; NID_SES=test-ses");
  });
});

describe("ChzzkApi.getChannelInfo", () => {
  it("returns the channel name", async () => {
    const { api } = createApi(() => ({ status: 200, body: { content: { channelId: CHANNEL_A, channelName: "alpha" } } }));

    expect(await api.getChannelInfo(CHANNEL_A)).toEqual({ channelId: CHANNEL_A, channelName: "alpha" });
  });

  it("returns null for ids that are not channels", async () => {
    const nullId = createApi(() => ({ status: 200, body: { content: { channelId: null, channelName: null } } }));
    const missing = createApi(() => ({ status: 404 }));

    expect(await nullId.api.getChannelInfo(CHANNEL_A)).toBeNull();
    expect(await missing.api.getChannelInfo(CHANNEL_A)).toBeNull();
  });
});

describe("ChzzkApi.getVideo", () => {
  it("reads video metadata", async () => {
    const { api, requests } = createApi(() => ({
      status: 200,
      body: {
        content: {
          videoNo: 42,
          videoTitle: "replay",
          publishDate: "2024-02-02 03:04:05",
          liveOpenDate: "2024-02-01 20:00:00",
          channel: { channelName: "alpha" }
        }
      }
    }));

    expect(await api.getVideo("https://chzzk.naver.com/video/42")).toEqual({
      videoNo: 42,
      title: "replay",
      channelName: "alpha",
      publishedAt: new Date(2024, 1, 2, 3, 4, 5),
      liveStartedAt: new Date(2024, 1, 1, 20, 0, 0)
    });
    expect(requests[0]?.url).toBe("https://api.test/service/v1/videos/42");
  });

  it("parses video URLs", () => {
    expect(parseVideoUrl("https://chzzk.naver.com/video/42")).toBe(42);
    expect(parseVideoUrl("https://chzzk.naver.com/video/42/")).toBe(42);
    expect(parseVideoUrl("https://chzzk.naver.com/live/42")).toBeNull();
    expect(parseVideoUrl("http://chzzk.naver.com/video/42")).toBeNull();
  });
});

describe("ChzzkStatusProber", () => {
  it("wraps unexpected failures in ProbeError", async () => {
    const prober = new ChzzkStatusProber({
      checkLive: async () => {
        throw new TypeError("socket hang up");
      }
    });

    await expect(prober.probe(CHANNEL_A)).rejects.toThrow(`Live check for ${CHANNEL_A} failed: socket hang up`);
  });
});
