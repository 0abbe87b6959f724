import fs from "node:fs";
import { spawn } from "node:child_process";
import { Command } from "commander";
import { createAppContext, setAppConfigValue, type AppContext } from "./context.js";
import { describeResponse, formatNotification } from "./format.js";
import { AppError, ConfigError, NotFoundError, ValidationError } from "../shared/errors.js";
import { CONFIG_KEYS, configKeyFromInput } from "../config/settings.js";
import { copyDatabaseIfMissing, persistConfigDir } from "../config/bootstrap.js";
import { DEFAULT_CONFIG_DIR } from "../shared/constants.js";
import { createLogger, createSilentLogger } from "../shared/logger.js";
import { readRuntime } from "../daemon/runtime.js";
import { ControlClient, commandTimeoutMs } from "../daemon/ipcClient.js";
import { RecorderDaemon } from "../daemon/daemon.js";
import { ChzzkApi } from "../chzzk/api.js";
import { ChannelRegistry } from "../registry/registry.js";
import { SessionPool } from "../core/sessions.js";
import { CommandHandler } from "../control/commands.js";
import type { ControlCommand, ControlResponse } from "../control/protocol.js";
import { resolveUserPath } from "../utils/path.js";

interface GlobalOptions {
  configDir?: string;
  requester?: string;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = new Command();
  program
    .name("chzr")
    .description("Records Chzzk channels with streamlink whenever they go live")
    .option("--config-dir <path>", "Override config directory for this command")
    .option("--requester <id>", "Identity sent with control commands");

  program
    .command("add")
    .argument("<channel>", "Chzzk channel id or channel URL")
    .action(async (channel: string) => {
      await runCommand(program.opts<GlobalOptions>(), { type: "add_channel", channelId: channel });
    });

  program
    .command("rm")
    .alias("remove")
    .argument("<channel>", "Chzzk channel id")
    .action(async (channel: string) => {
      await runCommand(program.opts<GlobalOptions>(), { type: "remove_channel", channelId: channel });
    });

  program
    .command("ls")
    .alias("list")
    .option("--json", "Output JSON")
    .action(async (options: { json?: boolean }) => {
      const response = await sendCommand(program.opts<GlobalOptions>(), { type: "list_channels" });
      if (options.json && response.type === "channel_list") {
        console.log(JSON.stringify(response.channels, null, 2));
        return;
      }
      report(response);
    });

  program
    .command("download")
    .alias("vod")
    .argument("<url>", "Chzzk video URL (https://chzzk.naver.com/video/<no>)")
    .argument("[quality]", "Stream quality, defaults to the configured quality")
    .action(async (url: string, quality: string | undefined) => {
      const globals = program.opts<GlobalOptions>();
      const context = createContext(globals);
      const runtime = readRuntime(context.configDir);
      context.close();
      if (!runtime) {
        throw new ValidationError("Downloads run inside the daemon; start it with 'chzr daemon start'");
      }
      await runCommand(globals, { type: "download_vod", url, quality });
    });

  program
    .command("watch")
    .description("Print recorder notifications as they happen")
    .option("--since <seq>", "Replay buffered notifications after this sequence number")
    .action(async (options: { since?: string }) => {
      await watchNotifications(program.opts<GlobalOptions>(), options.since);
    });

  program
    .command("stats")
    .option("--json", "Output JSON")
    .action((options: { json?: boolean }) => {
      const context = createContext(program.opts<GlobalOptions>());
      try {
        const payload = {
          channels: context.db.getChannelStats(),
          sessions: context.db.getSessionStats(),
          downloads: context.db.getDownloadStats(),
          daemon: {
            running: readRuntime(context.configDir) !== null
          }
        };

        if (options.json) {
          console.log(JSON.stringify(payload, null, 2));
          return;
        }

        console.log(`Channels: total=${payload.channels.total}`);
        console.log(
          `Recordings: total=${payload.sessions.total} active=${payload.sessions.active} finished=${payload.sessions.finished} durationSec=${payload.sessions.totalDurationSec}`
        );
        console.log(
          `Downloads: total=${payload.downloads.total} succeeded=${payload.downloads.succeeded} failed=${payload.downloads.failed}`
        );
        console.log(`Daemon: running=${payload.daemon.running}`);
      } finally {
        context.close();
      }
    });

  const config = program.command("config").description("Read and update configuration");

  config.command("list").action(() => {
    const context = createContext(program.opts<GlobalOptions>());
    try {
      const values = context.db.listConfigRaw();
      console.log(`configDir=${context.configDir}`);
      for (const key of CONFIG_KEYS) {
        console.log(`${key}=${values[key] ?? ""}`);
      }
    } finally {
      context.close();
    }
  });

  config
    .command("get")
    .argument("<key>")
    .action((keyInput: string) => {
      const context = createContext(program.opts<GlobalOptions>());
      try {
        const key = configKeyFromInput(keyInput);
        if (key === "configDir") {
          console.log(context.configDir);
          return;
        }

        console.log(context.db.getConfigValueRaw(key));
      } finally {
        context.close();
      }
    });

  config
    .command("set")
    .argument("<key>")
    .argument("<value>")
    .action((keyInput: string, value: string) => {
      const context = createContext(program.opts<GlobalOptions>());
      try {
        const key = configKeyFromInput(keyInput);

        if (key === "configDir") {
          const nextDir = resolveUserPath(value);
          if (nextDir === context.configDir) {
            console.log(`configDir already set to ${nextDir}`);
            return;
          }

          context.db.checkpoint();
          fs.mkdirSync(nextDir, { recursive: true });
          copyDatabaseIfMissing(context.configDir, nextDir);
          persistConfigDir(nextDir);
          console.log(`configDir set to ${nextDir}`);
          return;
        }

        const updated = setAppConfigValue(context, key, value);
        console.log(`Updated ${key}=${Array.isArray(updated) ? updated.join(",") : String(updated)}`);
        if (readRuntime(context.configDir)) {
          console.log("Restart the daemon to apply the change");
        }
      } finally {
        context.close();
      }
    });

  const daemon = program.command("daemon").description("Control the recorder daemon");

  daemon.command("status").action(async () => {
    await printDaemonStatus(program.opts<GlobalOptions>());
  });

  program
    .command("status")
    .description("Alias of 'daemon status'")
    .action(async () => {
      await printDaemonStatus(program.opts<GlobalOptions>());
    });

  daemon.command("start").action(async () => {
    const context = createContext(program.opts<GlobalOptions>());
    try {
      context.loadConfig();
      const runtime = readRuntime(context.configDir);
      if (runtime) {
        console.log(`Daemon already running (pid ${runtime.pid})`);
        return;
      }

      const entry = process.argv[1];
      if (!entry) {
        throw new Error("Unable to determine CLI entrypoint");
      }

      const child = spawn(process.execPath, [entry, "--config-dir", context.configDir, "daemon-run"], {
        detached: true,
        stdio: "ignore"
      });
      child.unref();

      const started = await waitForDaemonRuntime(context.configDir, 8000);
      if (!started) {
        throw new Error("Daemon did not start in time; run 'chzr daemon-run' in the foreground to see why");
      }

      console.log("Daemon started");
    } finally {
      context.close();
    }
  });

  daemon.command("stop").action(() => {
    const context = createContext(program.opts<GlobalOptions>());
    try {
      const runtime = readRuntime(context.configDir);
      if (!runtime) {
        console.log("Daemon is not running");
        return;
      }

      try {
        process.kill(runtime.pid, "SIGTERM");
        console.log(`Daemon stop requested (pid ${runtime.pid})`);
      } catch {
        console.log("Daemon appears to have already stopped");
      }
    } finally {
      context.close();
    }
  });

  program
    .command("daemon-run")
    .description("Run the recorder in the foreground")
    .action(async () => {
      await runDaemonProcess(program.opts<GlobalOptions>().configDir);
    });

  await program.parseAsync(argv);
}

async function runDaemonProcess(configDirOverride?: string): Promise<void> {
  const context = createAppContext({ configDirOverride });
  let daemon: RecorderDaemon;
  try {
    const config = context.loadConfig();
    daemon = new RecorderDaemon({
      configDir: context.configDir,
      config,
      db: context.db,
      logger: createLogger(config.logLevel)
    });
    await daemon.start();
  } catch (error) {
    context.close();
    throw error;
  }

  const shutdown = async () => {
    await daemon.stop();
    context.close();
    process.exit(0);
  };

  process.once("SIGINT", () => {
    void shutdown();
  });

  process.once("SIGTERM", () => {
    void shutdown();
  });
}

function createContext(options: GlobalOptions): AppContext {
  return createAppContext({
    configDirOverride: options.configDir
  });
}

/** Through the daemon when it runs, so the registry keeps one owner; straight to the database otherwise. */
async function sendCommand(globals: GlobalOptions, command: ControlCommand): Promise<ControlResponse> {
  const withRequester = globals.requester ? { ...command, requester: globals.requester } : command;
  const context = createContext(globals);
  try {
    const runtime = readRuntime(context.configDir);
    if (runtime) {
      const client = new ControlClient(runtime, { timeoutMs: commandTimeoutMs(runtime.stopGraceSec) });
      return await client.send(withRequester);
    }

    const config = context.loadConfig();
    const handler = new CommandHandler({
      registry: new ChannelRegistry(context.db),
      sessions: new SessionPool(() => {
        throw new Error("No recording sessions run outside the daemon");
      }),
      downloader: {
        start: () => {
          throw new ValidationError("Downloads run inside the daemon; start it with 'chzr daemon start'");
        }
      },
      directory: new ChzzkApi({ timeoutSec: config.probeTimeoutSec, nidAut: config.nidAut, nidSes: config.nidSes }),
      allowedRequesters: () => [],
      logger: createSilentLogger()
    });
    return await handler.handle(withRequester);
  } finally {
    context.close();
  }
}

async function runCommand(globals: GlobalOptions, command: ControlCommand): Promise<void> {
  report(await sendCommand(globals, command));
}

function report(response: ControlResponse): void {
  const { text, exitCode } = describeResponse(response);
  if (exitCode === 0) {
    console.log(text);
    return;
  }
  console.error(text);
  process.exitCode = exitCode;
}

async function printDaemonStatus(globals: GlobalOptions): Promise<void> {
  const context = createContext(globals);
  try {
    const runtime = readRuntime(context.configDir);
    if (!runtime) {
      console.log("Daemon: stopped");
      return;
    }

    try {
      const status = await new ControlClient(runtime).status();
      console.log(
        `Daemon: running pid=${status.pid} port=${status.port} channels=${status.channels} activeRecordings=${status.activeRecordings} runningDownloads=${status.runningDownloads} nextPollAt=${status.nextPollAt ?? "n/a"}`
      );
    } catch {
      console.log(`Daemon: running pid=${runtime.pid} (status endpoint unavailable)`);
    }
  } finally {
    context.close();
  }
}

/** Follows the notification stream, reconnecting with Last-Event-ID when the daemon restarts. */
async function watchNotifications(globals: GlobalOptions, sinceInput?: string): Promise<void> {
  const context = createContext(globals);
  let timeFormat: string;
  try {
    timeFormat = context.loadConfig().msgTimeFormat;
  } finally {
    context.close();
  }

  let since = sinceInput === undefined ? undefined : Number.parseInt(sinceInput, 10);
  if (since !== undefined && (!Number.isInteger(since) || since < 0)) {
    throw new ValidationError(`--since must be a non-negative integer: ${sinceInput}`);
  }

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  while (!controller.signal.aborted) {
    const lookup = createContext(globals);
    const runtime = readRuntime(lookup.configDir);
    lookup.close();

    if (!runtime) {
      console.error("Daemon is not running; waiting...");
      await sleep(5000);
      continue;
    }

    try {
      since = await new ControlClient(runtime).events(
        (event) => console.log(formatNotification(event, timeFormat)),
        { since, signal: controller.signal }
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`Notification stream interrupted: ${reason}`);
      await sleep(2000);
    }
  }
}

async function waitForDaemonRuntime(configDir: string, timeoutMs: number): Promise<boolean> {
  const startedAt = Date.now();
  while (Date.now() - startedAt < timeoutMs) {
    const runtime = readRuntime(configDir);
    if (runtime) {
      return true;
    }
    await sleep(150);
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function handleCliError(error: unknown): number {
  if (error instanceof ConfigError) {
    console.error(error.message);
    console.error("Fix the values with 'chzr config set <key> <value>'");
    return 2;
  }

  if (error instanceof NotFoundError || error instanceof ValidationError) {
    console.error(error.message);
    return 2;
  }

  if (error instanceof AppError || error instanceof Error) {
    console.error(error.message);
    return 1;
  }

  console.error("Unknown error");
  return 1;
}

export function printHelpHint(): void {
  console.error(`Run 'chzr help' for usage. Default config dir: ${DEFAULT_CONFIG_DIR}`);
}
