import path from "node:path";
import type { Logger } from "../shared/logger.js";
import { StorageUnavailableError } from "../shared/errors.js";
import { ensureDirSync, isWritableDir } from "../utils/fs.js";
import { toDirName } from "../utils/path.js";
import { runCommand, type CommandResult } from "../utils/process.js";

export interface StorageOptions {
  recordingsDir: string;
  fallbackToLocalDir: boolean;
  fallbackDir: string;
  recoveryCommand: string;
  recoveryTimeoutSec: number;
  logger: Logger;
  runRecovery?: (command: string, timeoutMs: number) => Promise<CommandResult>;
}

export interface StorageLocation {
  dir: string;
  fallback: boolean;
}

/**
 * Picks the directory a recording or download is written to.
 *
 * The save root is usually a mount point, so it is never created here. When it
 * is unreachable the recovery command (if any) runs once per outage; after that
 * the fallback directory is used, or StorageUnavailableError is thrown.
 */
export class StorageResolver {
  private recovery?: Promise<void>;
  private readonly runRecovery: (command: string, timeoutMs: number) => Promise<CommandResult>;

  constructor(private readonly options: StorageOptions) {
    this.runRecovery =
      options.runRecovery ?? ((command, timeoutMs) => runCommand({ cmd: command, shell: true, timeoutMs }));
  }

  async resolveDir(name: string): Promise<StorageLocation> {
    const root = await this.usableRoot();
    const base = root ?? this.fallbackBase();
    const dir = path.join(base, toDirName(name));
    ensureDirSync(dir);
    return { dir, fallback: root === null };
  }

  /** Fails only when neither the save root nor a fallback can be used. */
  async checkAtStartup(): Promise<StorageLocation> {
    const root = await this.usableRoot();
    if (root) {
      this.options.logger.info({ dir: root }, "save directory ready");
      return { dir: root, fallback: false };
    }

    const fallback = this.fallbackBase();
    this.options.logger.warn(
      { dir: this.options.recordingsDir, fallback },
      "save directory unavailable; recordings will go to the fallback directory"
    );
    return { dir: fallback, fallback: true };
  }

  private async usableRoot(): Promise<string | null> {
    const root = this.options.recordingsDir;
    if (isWritableDir(root)) {
      this.recovery = undefined;
      return root;
    }

    if (this.options.recoveryCommand) {
      if (!this.recovery) {
        this.recovery = this.recover();
      }
      await this.recovery;
      if (isWritableDir(root)) {
        return root;
      }
    }

    return null;
  }

  private async recover(): Promise<void> {
    this.options.logger.warn({ command: this.options.recoveryCommand }, "save directory unavailable; running recovery command");
    const result = await this.runRecovery(this.options.recoveryCommand, this.options.recoveryTimeoutSec * 1000);
    if (result.exitCode === 0) {
      this.options.logger.info("recovery command finished");
    } else {
      this.options.logger.error({ exitCode: result.exitCode, stderr: result.stderr.trim() }, "recovery command failed");
    }
  }

  private fallbackBase(): string {
    if (!this.options.fallbackToLocalDir) {
      throw new StorageUnavailableError(
        `Save directory ${this.options.recordingsDir} is unavailable and fallbackToLocalDir is disabled`
      );
    }
    ensureDirSync(this.options.fallbackDir);
    return this.options.fallbackDir;
  }
}
