import type { Channel, ChannelState, ShutdownPolicy } from "../shared/types.js";
import type { RecordingSession } from "./session.js";

export type SessionFactory = (channel: Channel) => RecordingSession;

/** Owns the one RecordingSession each registered channel has. */
export class SessionPool {
  private readonly sessions = new Map<string, RecordingSession>();

  constructor(private readonly factory: SessionFactory) {}

  /**
   * Returns the channel's session, creating it on first use. A session that is
   * still being stopped stays in the pool (and ignores ticks) until its capture
   * is gone, so a re-added channel can never run two captures at once.
   */
  sessionFor(channel: Channel): RecordingSession {
    const existing = this.sessions.get(channel.id);
    if (existing) {
      return existing;
    }

    const session = this.factory(channel);
    this.sessions.set(channel.id, session);
    return session;
  }

  stateOf(channelId: string): ChannelState {
    return this.sessions.get(channelId)?.state ?? "idle";
  }

  /** Force-stops the channel's capture, if any, and forgets the session. */
  async stop(channelId: string): Promise<void> {
    const session = this.sessions.get(channelId);
    if (!session) {
      return;
    }

    try {
      await session.close();
    } finally {
      if (this.sessions.get(channelId) === session) {
        this.sessions.delete(channelId);
      }
    }
  }

  async shutdown(policy: ShutdownPolicy): Promise<void> {
    const sessions = Array.from(this.sessions.values());
    this.sessions.clear();

    if (policy === "detach") {
      for (const session of sessions) {
        session.release();
      }
      return;
    }

    await Promise.all(sessions.map((session) => session.close()));
  }

  activeCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.state === "recording") {
        count += 1;
      }
    }
    return count;
  }
}
