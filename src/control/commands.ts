import type { Logger } from "../shared/logger.js";
import type { Channel } from "../shared/types.js";
import { AlreadyExistsError, UnauthorizedError } from "../shared/errors.js";
import type { ChannelRegistry } from "../registry/registry.js";
import type { SessionPool } from "../core/sessions.js";
import type { ArchiveDownloader } from "../core/downloader.js";
import type { ChannelDirectory } from "../chzzk/api.js";
import {
  UnknownChannelError,
  errorResponse,
  normalizeChannelInput,
  type ControlCommand,
  type ControlResponse
} from "./protocol.js";

export interface CommandHandlerOptions {
  registry: ChannelRegistry;
  sessions: Pick<SessionPool, "stop" | "stateOf">;
  downloader: Pick<ArchiveDownloader, "start">;
  directory: ChannelDirectory;
  allowedRequesters: () => string[];
  logger: Logger;
  now?: () => Date;
}

/** Applies control commands to the registry, sessions and downloader. */
export class CommandHandler {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: CommandHandlerOptions) {
    this.logger = options.logger.child({ component: "commands" });
    this.now = options.now ?? (() => new Date());
  }

  /** Never throws: every failure becomes an `error` response with a specific kind. */
  async handle(command: ControlCommand): Promise<ControlResponse> {
    this.logger.info({ command: command.type, requester: command.requester }, "command received");
    try {
      this.authorize(command.requester);
      return await this.dispatch(command);
    } catch (error) {
      const response = errorResponse(error);
      if (response.kind === "internal") {
        this.logger.error({ err: error, command: command.type }, "command failed");
      } else {
        this.logger.info({ command: command.type, kind: response.kind, reason: response.message }, "command rejected");
      }
      return response;
    }
  }

  private async dispatch(command: ControlCommand): Promise<ControlResponse> {
    switch (command.type) {
      case "add_channel": {
        const channel = await this.addChannel(command.channelId);
        return { type: "ack", message: `Added ${channel.displayName} (${channel.id}) to record list`, channel };
      }
      case "remove_channel": {
        const channel = await this.removeChannel(command.channelId);
        return { type: "ack", message: `Removed ${channel.displayName} (${channel.id}) from record list`, channel };
      }
      case "list_channels": {
        const channels = this.options.registry.list().map((channel) => ({
          ...channel,
          state: this.options.sessions.stateOf(channel.id)
        }));
        return { type: "channel_list", channels };
      }
      case "download_vod": {
        const job = this.options.downloader.start(command.url, command.quality);
        return { type: "ack", message: `Download of ${job.sourceUrl} started`, job };
      }
      default: {
        const _exhaustive: never = command;
        return _exhaustive;
      }
    }
  }

  private async addChannel(input: string): Promise<Channel> {
    const channelId = normalizeChannelInput(input);
    // rejected before the network round trip; add() re-checks once the lookup returns
    if (this.options.registry.has(channelId)) {
      throw new AlreadyExistsError(`Channel ID ${channelId} is already added`);
    }

    const info = await this.options.directory.getChannelInfo(channelId);
    if (!info) {
      throw new UnknownChannelError(`Channel ID ${channelId} is not a valid Chzzk channel`);
    }

    const channel = this.options.registry.add({
      id: channelId,
      displayName: info.channelName,
      addedAt: this.now().toISOString()
    });
    this.logger.info({ channelId, displayName: channel.displayName }, "channel added");
    return channel;
  }

  /** Resolves only after the channel's capture, if any, has fully exited. */
  private async removeChannel(input: string): Promise<Channel> {
    const channelId = normalizeChannelInput(input);
    const channel = this.options.registry.remove(channelId);
    await this.options.sessions.stop(channelId);
    this.logger.info({ channelId, displayName: channel.displayName }, "channel removed");
    return channel;
  }

  private authorize(requester: string | undefined): void {
    const allowed = this.options.allowedRequesters();
    if (allowed.length === 0) {
      return;
    }
    if (!requester || !allowed.includes(requester)) {
      throw new UnauthorizedError(`Requester ${requester ?? "(anonymous)"} is not allowed to send commands`);
    }
  }
}
