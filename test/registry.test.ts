import { describe, expect, it } from "vitest";
import { ChannelRegistry } from "../src/registry/registry.js";
import { AlreadyExistsError, NotFoundError } from "../src/shared/errors.js";
import type { Channel } from "../src/shared/types.js";
import { CHANNEL_A, CHANNEL_B, MemoryChannelStore } from "./helpers/fakes.js";

const alpha: Channel = { id: CHANNEL_A, displayName: "alpha", addedAt: "2024-01-01T00:00:00.000Z" };
const beta: Channel = { id: CHANNEL_B, displayName: "beta", addedAt: "2024-01-02T00:00:00.000Z" };

describe("ChannelRegistry", () => {
  it("loads stored channels in order", () => {
    const registry = new ChannelRegistry(new MemoryChannelStore([beta, alpha]));

    expect(registry.list().map((channel) => channel.id)).toEqual([CHANNEL_B, CHANNEL_A]);
    expect(registry.size).toBe(2);
  });

  it("adds and removes channels through the store", () => {
    const store = new MemoryChannelStore();
    const registry = new ChannelRegistry(store);

    registry.add(alpha);
    registry.add(beta);
    expect(store.rows.map((row) => row.id)).toEqual([CHANNEL_A, CHANNEL_B]);

    expect(registry.remove(CHANNEL_A)).toEqual(alpha);
    expect(store.rows.map((row) => row.id)).toEqual([CHANNEL_B]);
    expect(registry.get(CHANNEL_A)).toBeUndefined();
  });

  it("rejects duplicates and unknown removals", () => {
    const registry = new ChannelRegistry(new MemoryChannelStore([alpha]));

    expect(() => registry.add({ ...alpha, displayName: "other" })).toThrow(AlreadyExistsError);
    expect(() => registry.remove(CHANNEL_B)).toThrow(NotFoundError);
    expect(registry.get(CHANNEL_A)?.displayName).toBe("alpha");
  });

  it("leaves the set unchanged when the store write fails", () => {
    const store = new MemoryChannelStore();
    const registry = new ChannelRegistry(store);
    store.failWrites = true;

    expect(() => registry.add(alpha)).toThrow("disk full");
    expect(registry.has(CHANNEL_A)).toBe(false);
  });

  it("hands out copies", () => {
    const registry = new ChannelRegistry(new MemoryChannelStore([alpha]));

    const listed = registry.list();
    const first = listed[0];
    if (first) {
      first.displayName = "changed";
    }

    expect(registry.get(CHANNEL_A)?.displayName).toBe("alpha");
  });
});
