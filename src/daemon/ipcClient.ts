import { CONTROL_HOST, HTTP_API_PREFIX } from "../shared/constants.js";
import type { DaemonRuntime, DaemonStatus } from "../shared/types.js";
import type { NotificationEvent } from "../shared/events.js";
import type { ControlCommand, ControlResponse } from "../control/protocol.js";

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Time to allow a command round-trip. A removal waits for the capture to stop,
 * which can take the whole grace period before SIGKILL.
 */
export function commandTimeoutMs(stopGraceSec: number): number {
  return stopGraceSec * 1000 + DEFAULT_TIMEOUT_MS;
}

export interface ControlClientOptions {
  host?: string;
  timeoutMs?: number;
}

/** Talks to a running daemon's control server. */
export class ControlClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly runtime: Pick<DaemonRuntime, "port" | "token">,
    options: ControlClientOptions = {}
  ) {
    this.baseUrl = `http://${options.host ?? CONTROL_HOST}:${runtime.port}${HTTP_API_PREFIX}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async send(command: ControlCommand): Promise<ControlResponse> {
    const response = await fetch(`${this.baseUrl}/commands`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify(command),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (response.status === 401) {
      throw new Error("Daemon rejected the control token");
    }

    return (await response.json()) as ControlResponse;
  }

  async status(): Promise<DaemonStatus> {
    const response = await fetch(`${this.baseUrl}/status`, {
      headers: this.headers(),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Daemon request failed: ${response.status} ${text}`);
    }

    return (await response.json()) as DaemonStatus;
  }

  /**
   * Streams notifications until `signal` aborts or the daemon closes the
   * stream. Returns the seq of the last event seen, to resume from.
   */
  async events(
    onEvent: (event: NotificationEvent) => void,
    options: { since?: number; signal?: AbortSignal } = {}
  ): Promise<number | undefined> {
    const headers = this.headers();
    if (options.since !== undefined) {
      headers["Last-Event-ID"] = String(options.since);
    }

    const response = await fetch(`${this.baseUrl}/events`, { headers, signal: options.signal });
    if (!response.ok || !response.body) {
      throw new Error(`Event stream failed: ${response.status}`);
    }

    const parser = new SseParser();
    let lastSeq = options.since;
    const decoder = new TextDecoder();
    const reader = response.body.getReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        for (const data of parser.push(decoder.decode(value, { stream: true }))) {
          const event = JSON.parse(data) as NotificationEvent;
          lastSeq = event.seq;
          onEvent(event);
        }
      }
    } catch (error) {
      if (!options.signal?.aborted) {
        throw error;
      }
    } finally {
      reader.releaseLock();
    }
    return lastSeq;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.runtime.token}`,
      "Content-Type": "application/json"
    };
  }
}

/** Splits a Server-Sent Events byte stream into the `data` payloads of its messages. */
export class SseParser {
  private buffer = "";

  push(chunk: string): string[] {
    this.buffer += chunk.replace(/\r\n/g, "\n");
    const payloads: string[] = [];

    let boundary = this.buffer.indexOf("\n\n");
    while (boundary >= 0) {
      const block = this.buffer.slice(0, boundary);
      this.buffer = this.buffer.slice(boundary + 2);

      const data = block
        .split("\n")
        .filter((line) => line.startsWith("data:"))
        .map((line) => line.slice(5).replace(/^ /, ""));
      if (data.length > 0) {
        payloads.push(data.join("\n"));
      }
      boundary = this.buffer.indexOf("\n\n");
    }

    return payloads;
  }
}
