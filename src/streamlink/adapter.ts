import { spawnSync } from "node:child_process";
import { CHZZK_WEB_BASE } from "../shared/constants.js";
import type { ProcessHandle, ProcessLauncher } from "../utils/process.js";

export interface StreamlinkAdapterOptions {
  binaryPath: string;
  launcher: ProcessLauncher;
}

/** Builds streamlink command lines for live captures and VOD downloads. */
export class StreamlinkAdapter {
  constructor(private readonly options: StreamlinkAdapterOptions) {}

  assertAvailable(): void {
    const result = spawnSync(this.options.binaryPath, ["--version"], {
      stdio: "ignore"
    });
    if (result.error || result.status !== 0) {
      throw new Error(
        `Unable to execute streamlink binary at '${this.options.binaryPath}'. Set config streamlinkPath to a valid executable.`
      );
    }
  }

  captureLive(input: { channelId: string; quality: string; outputPath: string; detached: boolean }): Promise<ProcessHandle> {
    return this.options.launcher.launch({
      command: this.options.binaryPath,
      args: [`${CHZZK_WEB_BASE}/live/${input.channelId}`, input.quality, "--output", input.outputPath],
      detached: input.detached
    });
  }

  downloadVod(input: { url: string; quality: string; outputPath: string }): Promise<ProcessHandle> {
    return this.options.launcher.launch({
      command: this.options.binaryPath,
      args: [input.url, input.quality, "--output", input.outputPath]
    });
  }
}
