import type { Channel } from "../shared/types.js";
import { AlreadyExistsError, NotFoundError } from "../shared/errors.js";

/** Durable backing for the registry. Each call must be atomic on its own. */
export interface ChannelStore {
  loadChannels(): Channel[];
  insertChannel(channel: Channel): void;
  deleteChannel(id: string): void;
}

/**
 * The set of monitored channels, in insertion order.
 *
 * Every operation is synchronous, so a poll cycle reading `list()` and a
 * control command calling `add`/`remove` can never interleave halfway. The
 * store is written first; the in-memory view only changes once the write has
 * succeeded.
 */
export class ChannelRegistry {
  private readonly channels = new Map<string, Channel>();

  constructor(private readonly store: ChannelStore) {
    for (const channel of store.loadChannels()) {
      this.channels.set(channel.id, channel);
    }
  }

  add(channel: Channel): Channel {
    if (this.channels.has(channel.id)) {
      throw new AlreadyExistsError(`Channel ${channel.id} is already added`);
    }

    const entry = { ...channel };
    this.store.insertChannel(entry);
    this.channels.set(entry.id, entry);
    return { ...entry };
  }

  remove(id: string): Channel {
    const channel = this.channels.get(id);
    if (!channel) {
      throw new NotFoundError(`Channel ${id} is not added`);
    }

    this.store.deleteChannel(id);
    this.channels.delete(id);
    return { ...channel };
  }

  get(id: string): Channel | undefined {
    const channel = this.channels.get(id);
    return channel ? { ...channel } : undefined;
  }

  has(id: string): boolean {
    return this.channels.has(id);
  }

  list(): Channel[] {
    return Array.from(this.channels.values(), (channel) => ({ ...channel }));
  }

  get size(): number {
    return this.channels.size;
  }
}
