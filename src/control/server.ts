import http, { type IncomingMessage, type ServerResponse } from "node:http";
import type { Socket } from "node:net";
import type { Logger } from "../shared/logger.js";
import type { DaemonStatus } from "../shared/types.js";
import type { NotificationEvent } from "../shared/events.js";
import { HTTP_API_PREFIX, SUBSCRIBER_HIGH_WATERMARK } from "../shared/constants.js";
import { ValidationError } from "../shared/errors.js";
import type { CommandHandler } from "./commands.js";
import type { NotificationHub } from "./notifications.js";
import { decodeCommand, errorResponse, httpStatusFor, type ControlResponse } from "./protocol.js";

const MAX_BODY_BYTES = 64 * 1024;

export interface ControlServerOptions {
  host: string;
  port: number;
  token: string;
  commands: Pick<CommandHandler, "handle">;
  hub: Pick<NotificationHub, "subscribe" | "since">;
  status: () => DaemonStatus;
  logger: Logger;
  requestTimeoutMs?: number;
  keepAliveMs?: number;
  highWatermark?: number;
}

/**
 * Control plane over local HTTP.
 *
 *   POST /v1/commands  one ControlCommand in, one ControlResponse out
 *   GET  /v1/events    notification stream (Server-Sent Events, Last-Event-ID replay)
 *   GET  /v1/status    daemon status
 *
 * Every route needs `Authorization: Bearer <token>`.
 */
export class ControlServer {
  private server?: http.Server;
  private readonly streams = new Set<ServerResponse>();
  private readonly logger: Logger;

  constructor(private readonly options: ControlServerOptions) {
    this.logger = options.logger.child({ component: "control" });
  }

  get port(): number | undefined {
    const address = this.server?.address();
    return address && typeof address !== "string" ? address.port : undefined;
  }

  async listen(): Promise<number> {
    const server = http.createServer((req, res) => {
      void this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error({ err: error }, "control request handler failed");
        if (!res.headersSent) {
          this.writeJson(res, errorResponse(error), 500);
        } else {
          res.end();
        }
      });
    });
    server.requestTimeout = this.options.requestTimeoutMs ?? 30_000;
    server.on("clientError", (error: Error, socket: Socket) => {
      this.logger.warn({ err: error }, "control connection dropped");
      socket.destroy();
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    server.on("error", (error: Error) => {
      this.logger.error({ err: error }, "control server error");
    });

    this.server = server;
    const port = this.port;
    if (port === undefined) {
      throw new Error("Failed to bind control server");
    }
    this.logger.info({ host: this.options.host, port }, "control server listening");
    return port;
  }

  async close(): Promise<void> {
    for (const stream of this.streams) {
      stream.end();
    }
    this.streams.clear();

    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!this.authorize(req)) {
      const denied: ControlResponse = {
        type: "error",
        kind: "unauthorized",
        message: "Missing or invalid control token"
      };
      this.writeJson(res, denied, 401);
      return;
    }

    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");

    if (method === "POST" && url.pathname === `${HTTP_API_PREFIX}/commands`) {
      await this.handleCommand(req, res);
      return;
    }

    if (method === "GET" && url.pathname === `${HTTP_API_PREFIX}/events`) {
      this.openEventStream(req, res, url);
      return;
    }

    if (method === "GET" && url.pathname === `${HTTP_API_PREFIX}/status`) {
      this.writeJson(res, this.options.status());
      return;
    }

    const missing: ControlResponse = {
      type: "error",
      kind: "not_found",
      message: `No route for ${method} ${url.pathname}`
    };
    this.writeJson(res, missing, 404);
  }

  private async handleCommand(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let body: unknown;
    try {
      body = JSON.parse(await readBody(req, MAX_BODY_BYTES));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const response = errorResponse(new ValidationError(`Malformed command body: ${reason}`));
      this.writeJson(res, response, httpStatusFor(response));
      return;
    }

    let response: ControlResponse;
    try {
      response = await this.options.commands.handle(decodeCommand(body));
    } catch (error) {
      response = errorResponse(error);
    }

    if (res.destroyed) {
      this.logger.warn({ response: response.type }, "command caller disconnected before the response");
      return;
    }
    this.writeJson(res, response, httpStatusFor(response));
  }

  private openEventStream(req: IncomingMessage, res: ServerResponse, url: URL): void {
    const highWatermark = this.options.highWatermark ?? SUBSCRIBER_HIGH_WATERMARK;
    const lastSeen = parseSeq(req.headers["last-event-id"]) ?? parseSeq(url.searchParams.get("since") ?? undefined);

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive"
    });
    res.write(": connected\n\n");
    this.streams.add(res);

    let unsubscribe = (): void => undefined;
    let keepAlive: NodeJS.Timeout | undefined;
    const cleanup = (): void => {
      clearInterval(keepAlive);
      unsubscribe();
      this.streams.delete(res);
    };

    const send = (event: NotificationEvent): void => {
      if (res.writableLength > highWatermark) {
        this.logger.warn({ seq: event.seq }, "notification subscriber too slow; disconnecting");
        cleanup();
        res.destroy();
        return;
      }
      res.write(`id: ${event.seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
    };

    if (lastSeen !== undefined) {
      for (const event of this.options.hub.since(lastSeen)) {
        send(event);
      }
    }

    if (res.destroyed) {
      return;
    }

    unsubscribe = this.options.hub.subscribe(send);
    keepAlive = setInterval(() => {
      res.write(": ping\n\n");
    }, this.options.keepAliveMs ?? 15_000);

    res.on("close", cleanup);
    this.logger.info({ subscribers: this.streams.size, lastSeen }, "notification subscriber connected");
  }

  private authorize(req: IncomingMessage): boolean {
    const header = req.headers.authorization;
    if (!header) {
      return false;
    }
    return header === `Bearer ${this.options.token}`;
  }

  private writeJson(res: ServerResponse, body: unknown, statusCode = 200): void {
    res.statusCode = statusCode;
    res.setHeader("Content-Type", "application/json");
    res.end(`${JSON.stringify(body)}\n`);
  }
}

function parseSeq(value: string | string[] | undefined): number | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        reject(new Error(`body exceeds ${limit} bytes`));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}
