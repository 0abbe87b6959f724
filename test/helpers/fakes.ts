import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { StatusProber } from "../../src/chzzk/prober.js";
import type { ChannelStore } from "../../src/registry/registry.js";
import { AlreadyExistsError, NotFoundError } from "../../src/shared/errors.js";
import type { Channel, LiveStatus } from "../../src/shared/types.js";
import type { LaunchSpec, ProcessExit, ProcessHandle, ProcessLauncher } from "../../src/utils/process.js";

export const CHANNEL_A = "0123456789abcdef0123456789abcdef";
export const CHANNEL_B = "fedcba9876543210fedcba9876543210";

export class MemoryChannelStore implements ChannelStore {
  readonly rows: Channel[] = [];
  failWrites = false;

  constructor(initial: Channel[] = []) {
    this.rows.push(...initial);
  }

  loadChannels(): Channel[] {
    return this.rows.map((row) => ({ ...row }));
  }

  insertChannel(channel: Channel): void {
    if (this.failWrites) {
      throw new Error("disk full");
    }
    if (this.rows.some((row) => row.id === channel.id)) {
      throw new AlreadyExistsError(`Channel ${channel.id} is already added`);
    }
    this.rows.push({ ...channel });
  }

  deleteChannel(id: string): void {
    const index = this.rows.findIndex((row) => row.id === id);
    if (index < 0) {
      throw new NotFoundError(`Channel ${id} is not added`);
    }
    this.rows.splice(index, 1);
  }
}

export class FakeProcessHandle implements ProcessHandle {
  readonly signals: NodeJS.Signals[] = [];
  readonly exited: Promise<ProcessExit>;
  private resolveExit: (exit: ProcessExit) => void = () => undefined;

  constructor(
    readonly pid: number,
    private readonly exitOnKill: boolean
  ) {
    this.exited = new Promise<ProcessExit>((resolve) => {
      this.resolveExit = resolve;
    });
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    if (this.exitOnKill) {
      this.exit({ code: null, signal });
    }
    return true;
  }

  exit(exit: ProcessExit): void {
    this.resolveExit(exit);
  }
}

export class FakeLauncher implements ProcessLauncher {
  readonly launches: LaunchSpec[] = [];
  readonly handles: FakeProcessHandle[] = [];
  failWith?: Error;
  exitOnKill = true;
  private nextPid = 1000;

  async launch(spec: LaunchSpec): Promise<ProcessHandle> {
    this.launches.push(spec);
    if (this.failWith) {
      throw this.failWith;
    }
    const handle = new FakeProcessHandle(this.nextPid, this.exitOnKill);
    this.nextPid += 1;
    this.handles.push(handle);
    return handle;
  }

  get last(): FakeProcessHandle {
    const handle = this.handles.at(-1);
    if (!handle) {
      throw new Error("nothing was launched");
    }
    return handle;
  }
}

export class FakeProber implements StatusProber {
  readonly calls: string[] = [];

  constructor(public respond: (channelId: string) => LiveStatus | Promise<LiveStatus>) {}

  async probe(channelId: string): Promise<LiveStatus> {
    this.calls.push(channelId);
    return this.respond(channelId);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

/** Lets every pending promise callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

const tempDirs: string[] = [];

export function makeTempDir(prefix = "chzr-test-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
