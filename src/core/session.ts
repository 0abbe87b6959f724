import path from "node:path";
import { Mutex } from "async-mutex";
import type { Logger } from "../shared/logger.js";
import type { Channel, ChannelState, LiveStatus } from "../shared/types.js";
import type { NotificationSink } from "../shared/events.js";
import type { StatusProber } from "../chzzk/prober.js";
import type { StreamlinkAdapter } from "../streamlink/adapter.js";
import type { StorageResolver } from "./storage.js";
import { buildLiveFileName } from "./filename.js";
import { fileSize, resolveUniquePath } from "../utils/fs.js";
import { terminateProcess, type ProcessExit, type ProcessHandle } from "../utils/process.js";

export interface SessionSettings {
  quality: string;
  liveFilenameTemplate: string;
  timeFormat: string;
  stopGraceSec: number;
  spawnWarnThreshold: number;
  detachCaptures: boolean;
}

export interface RecordingSessionDeps {
  channel: Channel;
  capture: Pick<StreamlinkAdapter, "captureLive">;
  storage: Pick<StorageResolver, "resolveDir">;
  notifier: NotificationSink;
  logger: Logger;
  settings: () => SessionSettings;
  now?: () => Date;
}

interface LiveContext {
  title: string;
  streamStartedAt: Date;
  outputPath?: string;
  recordStartedAt?: Date;
  spawnFailures: number;
}

interface ActiveCapture {
  handle: ProcessHandle;
  title: string;
  outputPath: string;
  streamStartedAt: Date;
  recordStartedAt: Date;
  forced: boolean;
  finished: Promise<void>;
}

/**
 * Per-channel recording state machine.
 *
 *   idle --live--> live --capture spawned--> recording --capture exited--> idle
 *
 * Transitions of one session never overlap: ticks and close() run under the
 * session mutex. While recording the session does not probe at all; only the
 * capture process exiting (or close()) leaves the recording state, because the
 * API can report a stream offline while streamlink is still draining it.
 */
export class RecordingSession {
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private current: ChannelState = "idle";
  private live?: LiveContext;
  private active?: ActiveCapture;
  private closed = false;

  constructor(private readonly deps: RecordingSessionDeps) {
    this.logger = deps.logger.child({ channelId: deps.channel.id });
    this.now = deps.now ?? (() => new Date());
  }

  get channelId(): string {
    return this.deps.channel.id;
  }

  get state(): ChannelState {
    return this.current;
  }

  get isBusy(): boolean {
    return this.mutex.isLocked();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** One poll: probe the channel and apply whatever transition the answer calls for. */
  tick(prober: StatusProber): Promise<void> {
    return this.mutex.runExclusive(() => this.evaluate(prober));
  }

  /**
   * Stops the session for good. A running capture gets SIGTERM, then SIGKILL
   * after the grace period; resolves once the process is gone and
   * `recording_stopped` has been published.
   */
  close(): Promise<void> {
    this.closed = true;
    return this.mutex.runExclusive(async () => {
      const capture = this.active;
      this.live = undefined;
      if (!capture) {
        this.current = "idle";
        return;
      }

      capture.forced = true;
      this.logger.info({ pid: capture.handle.pid }, "stopping capture");
      await terminateProcess(capture.handle, this.deps.settings().stopGraceSec * 1000);
      await capture.finished;
    });
  }

  /** Marks the session closed but leaves a running capture alone (detached shutdown). */
  release(): void {
    this.closed = true;
  }

  private async evaluate(prober: StatusProber): Promise<void> {
    if (this.closed || this.current === "recording") {
      return;
    }

    let status: LiveStatus;
    try {
      status = await prober.probe(this.channelId);
    } catch (error) {
      this.logger.warn({ err: error, state: this.current }, "live check failed; retrying next cycle");
      return;
    }

    if (this.closed) {
      return;
    }

    if (!status.live) {
      if (this.current === "live") {
        this.logger.info("channel went offline before capture started");
        this.live = undefined;
        this.current = "idle";
      } else {
        this.logger.debug("channel is offline");
      }
      return;
    }

    if (this.current === "idle" || !this.live) {
      this.logger.info({ title: status.title }, "channel is live");
      this.live = {
        title: status.title,
        streamStartedAt: status.startedAt,
        spawnFailures: 0
      };
      this.current = "live";
    }

    await this.startCapture(this.live);
  }

  private async startCapture(live: LiveContext): Promise<void> {
    const settings = this.deps.settings();
    let handle: ProcessHandle;
    let outputPath: string;
    let recordStartedAt: Date;

    try {
      if (!live.outputPath || !live.recordStartedAt) {
        live.recordStartedAt = this.now();
        live.outputPath = await this.computeOutputPath(live, live.recordStartedAt, settings);
      }
      outputPath = live.outputPath;
      recordStartedAt = live.recordStartedAt;

      handle = await this.deps.capture.captureLive({
        channelId: this.channelId,
        quality: settings.quality,
        outputPath,
        detached: settings.detachCaptures
      });
    } catch (error) {
      live.spawnFailures += 1;
      this.logger.error({ err: error, failures: live.spawnFailures }, "failed to start capture; retrying next cycle");
      if (live.spawnFailures === settings.spawnWarnThreshold) {
        const reason = error instanceof Error ? error.message : String(error);
        this.deps.notifier.publish({
          type: "warning",
          channelId: this.channelId,
          message: `Recording of ${this.deps.channel.displayName} failed to start ${live.spawnFailures} times in a row: ${reason}`
        });
      }
      return;
    }

    if (this.closed) {
      this.logger.info({ pid: handle.pid }, "channel removed while capture was starting; stopping it");
      await terminateProcess(handle, settings.stopGraceSec * 1000);
      return;
    }

    const capture: ActiveCapture = {
      handle,
      title: live.title,
      outputPath,
      streamStartedAt: live.streamStartedAt,
      recordStartedAt,
      forced: false,
      finished: Promise.resolve()
    };
    capture.finished = handle.exited
      .then((exit) => this.finishCapture(capture, exit))
      .catch((error: unknown) => {
        this.logger.error({ err: error }, "failed to finalize recording");
      });

    this.active = capture;
    this.live = undefined;
    this.current = "recording";
    this.logger.info({ pid: handle.pid, outputPath }, "recording started");
    this.deps.notifier.publish({
      type: "recording_started",
      channelId: this.channelId,
      displayName: this.deps.channel.displayName,
      title: capture.title,
      outputPath,
      streamStartedAt: capture.streamStartedAt.toISOString(),
      recordStartedAt: recordStartedAt.toISOString()
    });
  }

  private finishCapture(capture: ActiveCapture, exit: ProcessExit): void {
    if (this.active !== capture) {
      return;
    }

    this.active = undefined;
    this.current = "idle";

    const durationSec = Math.max(0, Math.round((this.now().getTime() - capture.recordStartedAt.getTime()) / 1000));
    const size = fileSize(capture.outputPath);
    this.logger.info(
      { pid: capture.handle.pid, code: exit.code, signal: exit.signal, durationSec, forced: capture.forced },
      "recording stopped"
    );

    this.deps.notifier.publish({
      type: "recording_stopped",
      channelId: this.channelId,
      displayName: this.deps.channel.displayName,
      outputPath: capture.outputPath,
      recordStartedAt: capture.recordStartedAt.toISOString(),
      durationSec,
      exitCode: exit.code,
      signal: exit.signal,
      fileSizeBytes: size,
      forced: capture.forced
    });

    if (size === null) {
      this.logger.error({ outputPath: capture.outputPath }, "recorded file not found");
      this.deps.notifier.publish({
        type: "warning",
        channelId: this.channelId,
        message: `Recorded file of ${this.deps.channel.displayName} was not found at ${capture.outputPath}; check the streamlink log`
      });
    }
  }

  private async computeOutputPath(live: LiveContext, recordStartedAt: Date, settings: SessionSettings): Promise<string> {
    const location = await this.deps.storage.resolveDir(this.deps.channel.displayName);
    if (location.fallback) {
      this.deps.notifier.publish({
        type: "warning",
        channelId: this.channelId,
        message: `Recording ${this.deps.channel.displayName} to fallback directory ${location.dir}; check that the save directory is mounted`
      });
    }

    const fileName = buildLiveFileName({
      template: settings.liveFilenameTemplate,
      timeFormat: settings.timeFormat,
      username: this.deps.channel.displayName,
      title: live.title,
      streamStartedAt: live.streamStartedAt,
      recordStartedAt
    });

    const outputPath = resolveUniquePath(path.join(location.dir, fileName));
    this.logger.info({ outputPath }, "recording will be saved");
    return outputPath;
  }
}
