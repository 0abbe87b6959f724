import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ArchiveDownloader } from "../src/core/downloader.js";
import { StorageResolver } from "../src/core/storage.js";
import { NotificationHub } from "../src/control/notifications.js";
import { StreamlinkAdapter } from "../src/streamlink/adapter.js";
import { ValidationError } from "../src/shared/errors.js";
import { createSilentLogger } from "../src/shared/logger.js";
import type { DownloadJob, VideoInfo } from "../src/shared/types.js";
import { FakeLauncher, createDeferred, makeTempDir, removeTempDirs } from "./helpers/fakes.js";

const logger = createSilentLogger();
const VIDEO_URL = "https://chzzk.naver.com/video/123";

const video: VideoInfo = {
  videoNo: 123,
  title: "VOD: part 1",
  channelName: "foo",
  publishedAt: new Date(2024, 1, 2, 3, 4, 5),
  liveStartedAt: null
};

describe("ArchiveDownloader", () => {
  let rootDir: string;
  let launcher: FakeLauncher;
  let hub: NotificationHub;
  let updates: DownloadJob[];
  let videos: Map<string, VideoInfo>;
  let downloader: ArchiveDownloader;

  beforeEach(() => {
    rootDir = makeTempDir();
    launcher = new FakeLauncher();
    hub = new NotificationHub({ logger });
    updates = [];
    videos = new Map([[VIDEO_URL, video]]);
    let nextId = 0;
    downloader = new ArchiveDownloader({
      catalog: { getVideo: async (url) => videos.get(url) ?? null },
      streamlink: new StreamlinkAdapter({ binaryPath: "streamlink", launcher }),
      storage: new StorageResolver({
        recordingsDir: rootDir,
        fallbackToLocalDir: false,
        fallbackDir: rootDir,
        recoveryCommand: "",
        recoveryTimeoutSec: 1,
        logger
      }),
      notifier: hub,
      logger,
      settings: () => ({
        quality: "best",
        vodFilenameTemplate: "[{username}]{uploaded}_{escaped_title}.ts",
        timeFormat: "yy-MM-dd HH_mm_ss"
      }),
      onJobUpdate: (job) => updates.push(job),
      newId: () => {
        nextId += 1;
        return `job-${nextId}`;
      }
    });
  });

  afterEach(() => {
    removeTempDirs();
  });

  const expectedPath = () => path.join(rootDir, "foo", "[foo]24-02-02 03_04_05_VOD_ part 1.ts");

  it("rejects a malformed URL without spawning anything", () => {
    expect(() => downloader.start("https://chzzk.naver.com/live/abc")).toThrow(ValidationError);
    expect(() => downloader.start(VIDEO_URL, "best; rm -rf")).toThrow(ValidationError);
    expect(launcher.launches).toHaveLength(0);
    expect(downloader.list()).toEqual([]);
    expect(hub.lastSeq).toBe(0);
  });

  it("downloads a video and reports completion once", async () => {
    const job = downloader.start(VIDEO_URL, "720p");
    expect(job).toMatchObject({ id: "job-1", status: "running", quality: "720p", outputPath: null });
    expect(downloader.runningCount()).toBe(1);

    await vi.waitFor(() => expect(launcher.launches).toHaveLength(1));
    expect(launcher.launches[0]?.args).toEqual([VIDEO_URL, "720p", "--output", expectedPath()]);

    fs.writeFileSync(expectedPath(), "abc");
    launcher.last.exit({ code: 0, signal: null });
    const finished = await downloader.waitFor("job-1");

    expect(finished.status).toBe("succeeded");
    expect(finished.pid).toBe(1000);
    expect(hub.since(0)).toMatchObject([
      { type: "download_completed", jobId: "job-1", sourceUrl: VIDEO_URL, outputPath: expectedPath(), fileSizeBytes: 3 }
    ]);
    expect(updates.map((update) => update.status)).toEqual(["running", "running", "succeeded"]);
    expect(downloader.runningCount()).toBe(0);
  });

  it("uses the configured quality when none is given", async () => {
    downloader.start(VIDEO_URL);
    await vi.waitFor(() => expect(launcher.launches).toHaveLength(1));
    expect(launcher.launches[0]?.args[1]).toBe("best");
    launcher.last.exit({ code: 0, signal: null });
    await downloader.waitFor("job-1");
  });

  it("reports a non-zero exit as a failure", async () => {
    downloader.start(VIDEO_URL);
    await vi.waitFor(() => expect(launcher.launches).toHaveLength(1));
    launcher.last.exit({ code: 1, signal: null });

    const finished = await downloader.waitFor("job-1");

    expect(finished.status).toBe("failed");
    expect(hub.since(0)).toMatchObject([
      {
        type: "download_failed",
        jobId: "job-1",
        outputPath: expectedPath(),
        reason: "streamlink exited with code 1"
      }
    ]);
  });

  it("fails a job whose video does not exist", async () => {
    const missing = "https://chzzk.naver.com/video/999";
    downloader.start(missing);

    const finished = await downloader.waitFor("job-1");

    expect(finished.status).toBe("failed");
    expect(launcher.launches).toHaveLength(0);
    expect(hub.since(0)).toMatchObject([
      { type: "download_failed", outputPath: null, reason: `Video ${missing} was not found` }
    ]);
  });

  it("fails a job whose streamlink cannot be started", async () => {
    launcher.failWith = new Error("spawn streamlink ENOENT");
    downloader.start(VIDEO_URL);

    const finished = await downloader.waitFor("job-1");

    expect(finished.status).toBe("failed");
    expect(hub.since(0)).toMatchObject([{ type: "download_failed", reason: "spawn streamlink ENOENT" }]);
  });

  it("terminates running downloads on shutdown", async () => {
    downloader.start(VIDEO_URL);
    await vi.waitFor(() => expect(downloader.get("job-1")?.pid).toBe(1000));

    await downloader.shutdown(1000);

    expect(launcher.last.signals).toEqual(["SIGTERM"]);
    expect(updates.at(-1)?.status).toBe("failed");
    expect(hub.since(0)).toMatchObject([{ type: "download_failed", reason: "streamlink was terminated by SIGTERM" }]);
  });

  it("does not spawn a download whose video is still being looked up at shutdown", async () => {
    const lookup = createDeferred<VideoInfo | null>();
    const gated = new ArchiveDownloader({
      catalog: { getVideo: () => lookup.promise },
      streamlink: new StreamlinkAdapter({ binaryPath: "streamlink", launcher }),
      storage: { resolveDir: async () => ({ dir: rootDir, fallback: false }) },
      notifier: hub,
      logger,
      settings: () => ({ quality: "best", vodFilenameTemplate: "{escaped_title}.ts", timeFormat: "yy" }),
      newId: () => "job-9"
    });
    gated.start(VIDEO_URL);

    const stopping = gated.shutdown(100);
    lookup.resolve(video);
    await stopping;

    expect(launcher.launches).toHaveLength(0);
    expect(gated.runningCount()).toBe(0);
    expect(hub.since(0)).toMatchObject([{ type: "download_failed", jobId: "job-9", reason: "daemon shutting down" }]);
  });

  it("stops a download whose streamlink was spawning when shutdown began", async () => {
    const spawn = createDeferred<void>();
    const launch = launcher.launch.bind(launcher);
    launcher.launch = async (spec) => {
      await spawn.promise;
      return launch(spec);
    };
    downloader.start(VIDEO_URL);
    await vi.waitFor(() => expect(updates).toHaveLength(2));

    const stopping = downloader.shutdown(100);
    spawn.resolve();
    await stopping;

    expect(launcher.last.signals).toEqual(["SIGTERM"]);
    expect(hub.since(0)).toMatchObject([{ type: "download_failed", reason: "streamlink was terminated by SIGTERM" }]);
  });

  it("refuses new downloads once shutdown has begun", async () => {
    await downloader.shutdown(100);

    expect(() => downloader.start(VIDEO_URL)).toThrow(
      "Cannot download https://chzzk.naver.com/video/123: daemon shutting down"
    );
  });

  it("forgets jobs once they have finished", async () => {
    downloader.start(VIDEO_URL);
    await vi.waitFor(() => expect(launcher.launches).toHaveLength(1));
    launcher.last.exit({ code: 0, signal: null });

    await downloader.waitFor("job-1");

    expect(downloader.get("job-1")).toBeUndefined();
    expect(downloader.list()).toEqual([]);
    await expect(downloader.waitFor("job-1")).rejects.toThrow("Download job job-1 not found");
  });
});
