import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { DbClient } from "../db/client.js";
import type { Logger } from "../shared/logger.js";
import type { AppConfig, Channel, DaemonRuntime, DaemonStatus } from "../shared/types.js";
import type { NotificationEvent } from "../shared/events.js";
import { CONTROL_HOST } from "../shared/constants.js";
import { ChzzkApi } from "../chzzk/api.js";
import { ChzzkStatusProber, type StatusProber } from "../chzzk/prober.js";
import { StreamlinkAdapter } from "../streamlink/adapter.js";
import { ChannelRegistry } from "../registry/registry.js";
import { RecordingSession, type SessionSettings } from "../core/session.js";
import { SessionPool } from "../core/sessions.js";
import { Scheduler } from "../core/scheduler.js";
import { ArchiveDownloader, type DownloaderSettings } from "../core/downloader.js";
import { StorageResolver } from "../core/storage.js";
import { NotificationHub } from "../control/notifications.js";
import { CommandHandler } from "../control/commands.js";
import { ControlServer } from "../control/server.js";
import { ensureDirSync } from "../utils/fs.js";
import { ChildProcessLauncher, isPidRunning, type ProcessLauncher } from "../utils/process.js";
import { clearRuntime, writeRuntime } from "./runtime.js";

export interface RecorderDaemonInput {
  configDir: string;
  config: AppConfig;
  db: DbClient;
  logger: Logger;
  launcher?: ProcessLauncher;
  api?: ChzzkApi;
  prober?: StatusProber;
}

/** Wires the recording engine together and owns its start/stop lifecycle. */
export class RecorderDaemon {
  readonly hub: NotificationHub;
  readonly registry: ChannelRegistry;
  readonly sessions: SessionPool;
  readonly scheduler: Scheduler;
  readonly downloader: ArchiveDownloader;
  private readonly server: ControlServer;
  private readonly storage: StorageResolver;
  private readonly streamlink: StreamlinkAdapter;
  private readonly token: string;
  private readonly lockPath: string;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private unsubscribeHistory?: () => void;
  private startedAt?: Date;
  private isStopping = false;

  constructor(private readonly input: RecorderDaemonInput) {
    const { config, db, logger } = input;
    this.config = config;
    this.logger = logger;
    this.lockPath = path.join(input.configDir, "daemon.lock");
    this.token = config.controlToken || crypto.randomBytes(24).toString("hex");

    const api = input.api ?? new ChzzkApi({ timeoutSec: config.probeTimeoutSec, nidAut: config.nidAut, nidSes: config.nidSes });
    const prober = input.prober ?? new ChzzkStatusProber(api);

    this.hub = new NotificationHub({ logger });
    this.registry = new ChannelRegistry(db);
    this.streamlink = new StreamlinkAdapter({
      binaryPath: config.streamlinkPath,
      launcher: input.launcher ?? new ChildProcessLauncher()
    });
    this.storage = new StorageResolver({
      recordingsDir: config.recordingsDir,
      fallbackToLocalDir: config.fallbackToLocalDir,
      fallbackDir: config.fallbackDir,
      recoveryCommand: config.recoveryCommand,
      recoveryTimeoutSec: config.recoveryTimeoutSec,
      logger: logger.child({ component: "storage" })
    });

    const sessionSettings: SessionSettings = {
      quality: config.quality,
      liveFilenameTemplate: config.liveFilenameTemplate,
      timeFormat: config.timeFormat,
      stopGraceSec: config.stopGraceSec,
      spawnWarnThreshold: config.spawnWarnThreshold,
      detachCaptures: config.onShutdown === "detach"
    };
    this.sessions = new SessionPool(
      (channel: Channel) =>
        new RecordingSession({
          channel,
          capture: this.streamlink,
          storage: this.storage,
          notifier: this.hub,
          logger,
          settings: () => sessionSettings
        })
    );

    this.scheduler = new Scheduler({
      registry: this.registry,
      sessions: this.sessions,
      prober,
      notifier: this.hub,
      logger,
      intervalSec: config.pollIntervalSec
    });

    const downloaderSettings: DownloaderSettings = {
      quality: config.quality,
      vodFilenameTemplate: config.vodFilenameTemplate,
      timeFormat: config.timeFormat
    };
    this.downloader = new ArchiveDownloader({
      catalog: api,
      streamlink: this.streamlink,
      storage: this.storage,
      notifier: this.hub,
      logger,
      settings: () => downloaderSettings,
      onJobUpdate: (job) => db.upsertDownloadJob(job)
    });

    const commands = new CommandHandler({
      registry: this.registry,
      sessions: this.sessions,
      downloader: this.downloader,
      directory: api,
      allowedRequesters: () => config.allowedRequesters,
      logger
    });

    this.server = new ControlServer({
      host: CONTROL_HOST,
      port: config.controlPort,
      token: this.token,
      commands,
      hub: this.hub,
      status: () => this.currentStatus(),
      logger
    });
  }

  async start(): Promise<DaemonRuntime> {
    this.acquireLock();
    this.streamlink.assertAvailable();
    await this.storage.checkAtStartup();

    const dangling = this.input.db.closeDanglingSessions(new Date().toISOString());
    if (dangling > 0) {
      this.logger.warn({ sessions: dangling }, "closed recording sessions left open by a previous run");
    }
    this.unsubscribeHistory = this.hub.subscribe((event) => this.recordHistory(event));

    const port = await this.server.listen();
    this.startedAt = new Date();
    const runtime: DaemonRuntime = {
      pid: process.pid,
      port,
      token: this.token,
      startedAt: this.startedAt.toISOString(),
      configDir: this.input.configDir,
      stopGraceSec: this.config.stopGraceSec
    };
    writeRuntime(this.input.configDir, runtime);

    this.logger.info(
      {
        port,
        channels: this.registry.list().map((channel) => `${channel.displayName} (${channel.id})`),
        quality: this.config.quality,
        recordingsDir: this.config.recordingsDir,
        intervalSec: this.config.pollIntervalSec,
        fallbackToLocalDir: this.config.fallbackToLocalDir
      },
      "recorder started"
    );

    this.scheduler.start();
    return runtime;
  }

  async stop(): Promise<void> {
    if (this.isStopping) {
      return;
    }
    this.isStopping = true;

    this.scheduler.stop();
    await this.sessions.shutdown(this.config.onShutdown);
    await this.downloader.shutdown(this.config.stopGraceSec * 1000);
    await this.server.close();
    this.unsubscribeHistory?.();

    clearRuntime(this.input.configDir);
    this.releaseLock();
    this.logger.info({ onShutdown: this.config.onShutdown }, "recorder stopped");
  }

  currentStatus(): DaemonStatus {
    const uptimeSec = this.startedAt ? Math.max(0, Math.floor((Date.now() - this.startedAt.getTime()) / 1000)) : 0;
    return {
      running: true,
      pid: process.pid,
      port: this.server.port,
      uptimeSec,
      channels: this.registry.size,
      activeRecordings: this.sessions.activeCount(),
      runningDownloads: this.downloader.runningCount(),
      nextPollAt: this.scheduler.nextPollAt?.toISOString()
    };
  }

  private recordHistory(event: NotificationEvent): void {
    switch (event.type) {
      case "recording_started":
        this.input.db.insertRecordingSession({
          channelId: event.channelId,
          title: event.title,
          outputPath: event.outputPath,
          streamStartedAt: event.streamStartedAt,
          recordStartedAt: event.recordStartedAt
        });
        return;
      case "recording_stopped":
        this.input.db.finishRecordingSession(event.channelId, event.outputPath, {
          endedAt: event.at,
          exitCode: event.exitCode,
          fileSizeBytes: event.fileSizeBytes
        });
        return;
      default:
        return;
    }
  }

  private acquireLock(): void {
    ensureDirSync(this.input.configDir);
    if (fs.existsSync(this.lockPath)) {
      const raw = fs.readFileSync(this.lockPath, "utf8").trim();
      const pid = Number.parseInt(raw, 10);
      if (pid !== process.pid && isPidRunning(pid)) {
        throw new Error(`Daemon lock exists and process ${pid} is still running.`);
      }
    }

    fs.writeFileSync(this.lockPath, `${process.pid}\n`, "utf8");
    this.input.db.upsertDaemonMeta("lastStartedAt", new Date().toISOString());
  }

  private releaseLock(): void {
    fs.rmSync(this.lockPath, { force: true });
  }
}
