import crypto from "node:crypto";
import path from "node:path";
import type { Logger } from "../shared/logger.js";
import type { DownloadJob } from "../shared/types.js";
import type { NotificationSink } from "../shared/events.js";
import { NotFoundError, ValidationError } from "../shared/errors.js";
import { parseVideoUrl, type VideoCatalog } from "../chzzk/api.js";
import type { StreamlinkAdapter } from "../streamlink/adapter.js";
import { parseQuality } from "../config/settings.js";
import type { StorageResolver } from "./storage.js";
import { buildVodFileName } from "./filename.js";
import { fileSize, resolveUniquePath } from "../utils/fs.js";
import { terminateProcess, type ProcessHandle } from "../utils/process.js";

export interface DownloaderSettings {
  quality: string;
  vodFilenameTemplate: string;
  timeFormat: string;
}

export interface ArchiveDownloaderOptions {
  catalog: VideoCatalog;
  streamlink: Pick<StreamlinkAdapter, "downloadVod">;
  storage: Pick<StorageResolver, "resolveDir">;
  notifier: NotificationSink;
  logger: Logger;
  settings: () => DownloaderSettings;
  onJobUpdate?: (job: DownloadJob) => void;
  now?: () => Date;
  newId?: () => string;
}

interface JobEntry {
  job: DownloadJob;
  handle?: ProcessHandle;
  done: Promise<void>;
}

type Outcome = { ok: true; outputPath: string } | { ok: false; reason: string };

const SHUTTING_DOWN = "daemon shutting down";

/**
 * One-shot VOD downloads. Each accepted job runs its own streamlink process and
 * ends in exactly one `download_completed` or `download_failed`; failed jobs
 * are not retried. Only running jobs are held in memory; finished ones live on
 * through `onJobUpdate`.
 */
export class ArchiveDownloader {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private stopGraceMs: number | null = null;

  constructor(private readonly options: ArchiveDownloaderOptions) {
    this.logger = options.logger.child({ component: "downloader" });
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  /** Validates and accepts a job. Throws ValidationError, without spawning anything, on bad input. */
  start(url: string, quality?: string): DownloadJob {
    const sourceUrl = url.trim();
    if (this.stopGraceMs !== null) {
      throw new ValidationError(`Cannot download ${url}: ${SHUTTING_DOWN}`);
    }
    if (parseVideoUrl(sourceUrl) === null) {
      throw new ValidationError(`Not a Chzzk video URL: ${url}`);
    }
    const selectedQuality = quality === undefined ? this.options.settings().quality : parseQuality(quality);

    const job: DownloadJob = {
      id: this.newId(),
      sourceUrl,
      quality: selectedQuality,
      outputPath: null,
      pid: null,
      status: "running",
      startedAt: this.now().toISOString(),
      endedAt: null
    };

    const entry: JobEntry = { job, done: Promise.resolve() };
    this.jobs.set(job.id, entry);
    this.update(job);
    this.logger.info({ jobId: job.id, url: sourceUrl, quality: selectedQuality }, "download accepted");

    entry.done = this.run(entry).catch((error: unknown) => {
      this.logger.error({ err: error, jobId: job.id }, "download bookkeeping failed");
    });
    return { ...job };
  }

  /** A job that is still running. */
  get(id: string): DownloadJob | undefined {
    const entry = this.jobs.get(id);
    return entry ? { ...entry.job } : undefined;
  }

  list(): DownloadJob[] {
    return Array.from(this.jobs.values(), (entry) => ({ ...entry.job }));
  }

  runningCount(): number {
    return this.jobs.size;
  }

  /** Resolves with the job once it has finished. Only running jobs can be waited for. */
  async waitFor(id: string): Promise<DownloadJob> {
    const entry = this.jobs.get(id);
    if (!entry) {
      throw new NotFoundError(`Download job ${id} not found`);
    }
    await entry.done;
    return { ...entry.job };
  }

  /**
   * Terminates every running download; each one reports `download_failed`.
   * Jobs that have not spawned streamlink yet fail without spawning it.
   */
  async shutdown(graceMs: number): Promise<void> {
    this.stopGraceMs = graceMs;
    await Promise.all(
      Array.from(this.jobs.values(), async (entry) => {
        if (entry.handle) {
          await terminateProcess(entry.handle, graceMs);
        }
        await entry.done;
      })
    );
  }

  private async run(entry: JobEntry): Promise<void> {
    try {
      this.finish(entry, await this.download(entry));
    } finally {
      this.jobs.delete(entry.job.id);
    }
  }

  private finish(entry: JobEntry, outcome: Outcome): void {
    const job = entry.job;
    job.endedAt = this.now().toISOString();
    job.status = outcome.ok ? "succeeded" : "failed";
    this.update(job);

    if (outcome.ok) {
      this.logger.info({ jobId: job.id, outputPath: outcome.outputPath }, "download completed");
      this.options.notifier.publish({
        type: "download_completed",
        jobId: job.id,
        sourceUrl: job.sourceUrl,
        outputPath: outcome.outputPath,
        fileSizeBytes: fileSize(outcome.outputPath)
      });
      return;
    }

    this.logger.error({ jobId: job.id, reason: outcome.reason }, "download failed");
    this.options.notifier.publish({
      type: "download_failed",
      jobId: job.id,
      sourceUrl: job.sourceUrl,
      outputPath: job.outputPath,
      reason: outcome.reason
    });
  }

  private async download(entry: JobEntry): Promise<Outcome> {
    const job = entry.job;
    try {
      const video = await this.options.catalog.getVideo(job.sourceUrl);
      if (!video) {
        return { ok: false, reason: `Video ${job.sourceUrl} was not found` };
      }

      const settings = this.options.settings();
      const location = await this.options.storage.resolveDir(video.channelName);
      if (location.fallback) {
        this.options.notifier.publish({
          type: "warning",
          message: `Downloading ${job.sourceUrl} to fallback directory ${location.dir}; check that the save directory is mounted`
        });
      }

      const fileName = buildVodFileName({
        template: settings.vodFilenameTemplate,
        timeFormat: settings.timeFormat,
        username: video.channelName,
        title: video.title,
        streamStartedAt: video.liveStartedAt,
        downloadStartedAt: new Date(job.startedAt),
        uploadedAt: video.publishedAt
      });
      const outputPath = resolveUniquePath(path.join(location.dir, fileName));
      job.outputPath = outputPath;
      this.update(job);

      if (this.stopGraceMs !== null) {
        return { ok: false, reason: SHUTTING_DOWN };
      }
      const handle = await this.options.streamlink.downloadVod({ url: job.sourceUrl, quality: job.quality, outputPath });
      entry.handle = handle;
      job.pid = handle.pid;
      this.logger.info({ jobId: job.id, pid: handle.pid, outputPath }, "download started");

      if (this.stopGraceMs !== null) {
        this.logger.info({ jobId: job.id, pid: handle.pid }, "shutting down while download was starting; stopping it");
        await terminateProcess(handle, this.stopGraceMs);
      }

      const exit = await handle.exited;
      if (exit.code === 0) {
        return { ok: true, outputPath };
      }
      return {
        ok: false,
        reason: exit.signal ? `streamlink was terminated by ${exit.signal}` : `streamlink exited with code ${exit.code ?? "unknown"}`
      };
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  private update(job: DownloadJob): void {
    if (!this.options.onJobUpdate) {
      return;
    }
    try {
      this.options.onJobUpdate({ ...job });
    } catch (error) {
      this.logger.error({ err: error, jobId: job.id }, "failed to persist download job");
    }
  }
}
