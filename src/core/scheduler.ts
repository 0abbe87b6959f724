import type { Logger } from "../shared/logger.js";
import type { NotificationHub } from "../control/notifications.js";
import type { ChannelRegistry } from "../registry/registry.js";
import type { StatusProber } from "../chzzk/prober.js";
import type { SessionPool } from "./sessions.js";

export interface SchedulerOptions {
  registry: Pick<ChannelRegistry, "list" | "has">;
  sessions: Pick<SessionPool, "sessionFor" | "activeCount">;
  prober: StatusProber;
  notifier: Pick<NotificationHub, "publish" | "lastSeq">;
  logger: Logger;
  intervalSec: number;
}

export interface CycleReport {
  ticked: string[];
  skipped: string[];
}

/**
 * Tick driver. Every interval it hands each registered channel to that
 * channel's session; channels run concurrently and a session still busy with
 * its previous tick sits the cycle out.
 */
export class Scheduler {
  private interval?: NodeJS.Timeout;
  private readonly intervalSec: number;
  private nextPoll?: Date;
  private readonly logger: Logger;

  constructor(private readonly options: SchedulerOptions) {
    this.intervalSec = options.intervalSec;
    this.logger = options.logger.child({ component: "scheduler" });
  }

  get nextPollAt(): Date | undefined {
    return this.nextPoll;
  }

  get isRunning(): boolean {
    return this.interval !== undefined;
  }

  start(): void {
    this.logger.info({ intervalSec: this.intervalSec }, "check/record loop starting");
    void this.runCycle();
    this.resetInterval();
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    this.nextPoll = undefined;
  }

  async runCycle(): Promise<CycleReport> {
    const startSeq = this.options.notifier.lastSeq;
    const channels = this.options.registry.list();
    const report: CycleReport = { ticked: [], skipped: [] };
    const nextPoll = new Date(Date.now() + this.intervalSec * 1000);
    this.nextPoll = nextPoll;
    this.logger.debug({ channels: channels.length }, "check cycle started");

    await Promise.all(
      channels.map(async (channel) => {
        // removed after the snapshot was taken
        if (!this.options.registry.has(channel.id)) {
          report.skipped.push(channel.id);
          return;
        }

        const session = this.options.sessions.sessionFor(channel);
        if (session.isBusy) {
          this.logger.debug({ channelId: channel.id }, "previous check still running; skipping");
          report.skipped.push(channel.id);
          return;
        }

        report.ticked.push(channel.id);
        try {
          await session.tick(this.options.prober);
        } catch (error) {
          this.logger.error({ err: error, channelId: channel.id }, "channel check failed");
        }
      })
    );

    const recording = this.options.sessions.activeCount();
    this.logger.info({ recording, nextPollAt: nextPoll.toISOString() }, "check cycle complete");

    if (this.options.notifier.lastSeq === startSeq) {
      this.options.notifier.publish({ type: "heartbeat" });
    }

    return report;
  }

  private resetInterval(): void {
    if (this.interval) {
      clearInterval(this.interval);
    }
    this.interval = setInterval(() => {
      void this.runCycle();
    }, this.intervalSec * 1000);
  }
}
