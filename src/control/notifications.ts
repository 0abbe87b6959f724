import type { Logger } from "../shared/logger.js";
import { NOTIFICATION_BACKLOG } from "../shared/constants.js";
import type { NotificationEvent, NotificationPayload, NotificationSink } from "../shared/events.js";

export type NotificationListener = (event: NotificationEvent) => void;

export interface NotificationHubOptions {
  logger: Logger;
  backlog?: number;
  now?: () => Date;
}

/**
 * Fans notification events out to every subscriber synchronously and keeps a
 * bounded backlog so a reconnecting consumer can catch up from its last seq.
 * Heartbeats reach live subscribers only and never enter the backlog.
 * Listeners must not block; a throwing listener is logged and skipped.
 */
export class NotificationHub implements NotificationSink {
  private readonly listeners = new Set<NotificationListener>();
  private readonly backlog: NotificationEvent[] = [];
  private readonly capacity: number;
  private readonly now: () => Date;
  private seq = 0;

  constructor(private readonly options: NotificationHubOptions) {
    this.capacity = options.backlog ?? NOTIFICATION_BACKLOG;
    this.now = options.now ?? (() => new Date());
  }

  publish(payload: NotificationPayload): NotificationEvent {
    this.seq += 1;
    const event: NotificationEvent = { ...payload, seq: this.seq, at: this.now().toISOString() };

    if (event.type !== "heartbeat") {
      this.backlog.push(event);
      if (this.backlog.length > this.capacity) {
        this.backlog.shift();
      }
    }

    for (const listener of Array.from(this.listeners)) {
      try {
        listener(event);
      } catch (error) {
        this.options.logger.error({ err: error, seq: event.seq, type: event.type }, "notification listener failed");
      }
    }

    return event;
  }

  subscribe(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Events newer than `afterSeq` that are still in the backlog, oldest first. */
  since(afterSeq: number): NotificationEvent[] {
    return this.backlog.filter((event) => event.seq > afterSeq);
  }

  get lastSeq(): number {
    return this.seq;
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }
}
