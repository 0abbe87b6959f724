import { spawn } from "node:child_process";
import { SpawnError } from "../shared/errors.js";

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProcessHandle {
  readonly pid: number;
  /** Settles once, when the process has exited. Never rejects. */
  readonly exited: Promise<ProcessExit>;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface LaunchSpec {
  command: string;
  args: string[];
  /** Leave the child running in its own process group when this process exits. */
  detached?: boolean;
}

export interface ProcessLauncher {
  launch(spec: LaunchSpec): Promise<ProcessHandle>;
}

export class ChildProcessLauncher implements ProcessLauncher {
  launch(spec: LaunchSpec): Promise<ProcessHandle> {
    return new Promise<ProcessHandle>((resolve, reject) => {
      const child = spawn(spec.command, spec.args, {
        stdio: "ignore",
        detached: spec.detached ?? false
      });

      const exited = new Promise<ProcessExit>((resolveExit) => {
        child.once("exit", (code, signal) => {
          resolveExit({ code, signal });
        });
      });

      // after "spawn" a later error (a failed kill) leaves the promise settled
      child.on("error", (error) => {
        reject(new SpawnError(`Failed to start ${spec.command}: ${error.message}`, error));
      });

      child.once("spawn", () => {
        const pid = child.pid ?? -1;
        if (spec.detached) {
          child.unref();
        }
        resolve({
          pid,
          exited,
          kill: (signal = "SIGTERM") => child.kill(signal)
        });
      });
    });
  }
}

/**
 * Sends SIGTERM, waits up to `graceMs` for the process to exit, then escalates
 * to SIGKILL. Resolves with the exit once the process is gone.
 */
export async function terminateProcess(handle: ProcessHandle, graceMs: number): Promise<ProcessExit> {
  handle.kill("SIGTERM");

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), graceMs);
  });

  const first = await Promise.race([handle.exited, timedOut]);
  clearTimeout(timer);
  if (first) {
    return first;
  }

  handle.kill("SIGKILL");
  return handle.exited;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export function runCommand(input: {
  cmd: string;
  args?: string[];
  shell?: boolean;
  timeoutMs: number;
}): Promise<CommandResult> {
  return new Promise((resolve) => {
    const child = spawn(input.cmd, input.args ?? [], {
      stdio: ["ignore", "pipe", "pipe"],
      shell: input.shell ?? false
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timeout = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
    }, input.timeoutMs);

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf8");
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf8");
    });

    child.on("close", (code) => {
      clearTimeout(timeout);
      resolve({
        exitCode: timedOut ? 124 : (code ?? 1),
        stdout,
        stderr: timedOut ? `${stderr}\ncommand timeout` : stderr
      });
    });

    child.on("error", (error) => {
      clearTimeout(timeout);
      resolve({
        exitCode: 1,
        stdout,
        stderr: error.message
      });
    });
  });
}

export function isPidRunning(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }

  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
