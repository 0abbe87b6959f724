import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { RUNTIME_FILE_NAME } from "../shared/constants.js";
import type { DaemonRuntime } from "../shared/types.js";
import { ensureDirSync, readJsonFileSync, writeJsonFileSync } from "../utils/fs.js";
import { isPidRunning } from "../utils/process.js";

const runtimeSchema = z.object({
  pid: z.number().int(),
  port: z.number().int(),
  token: z.string(),
  startedAt: z.string(),
  configDir: z.string(),
  stopGraceSec: z.number().nonnegative()
});

export function runtimeFilePath(configDir: string): string {
  return path.join(configDir, RUNTIME_FILE_NAME);
}

/** The running daemon's endpoint, or null when no live daemon owns this config dir. */
export function readRuntime(configDir: string): DaemonRuntime | null {
  const parsed = runtimeSchema.safeParse(readJsonFileSync<unknown>(runtimeFilePath(configDir)));
  if (!parsed.success) {
    return null;
  }
  if (!isPidRunning(parsed.data.pid)) {
    clearRuntime(configDir);
    return null;
  }
  return parsed.data;
}

/** Written with owner-only permissions: the file carries the control token. */
export function writeRuntime(configDir: string, runtime: DaemonRuntime): void {
  ensureDirSync(configDir);
  const filePath = runtimeFilePath(configDir);
  writeJsonFileSync(filePath, runtime);
  fs.chmodSync(filePath, 0o600);
}

export function clearRuntime(configDir: string): void {
  fs.rmSync(runtimeFilePath(configDir), { force: true });
}
