import fs from "node:fs";
import path from "node:path";
import { BOOTSTRAP_FILE_NAME, DB_FILE_NAME, DEFAULT_CONFIG_DIR } from "../shared/constants.js";
import { ensureDirSync, readJsonFileSync, writeJsonFileSync } from "../utils/fs.js";
import { resolveUserPath } from "../utils/path.js";

interface BootstrapFile {
  configDir?: string;
}

export const CONFIG_DIR_ENV = "CHZR_CONFIG_DIR";

export function getBootstrapPath(rootDir: string = DEFAULT_CONFIG_DIR): string {
  return path.join(rootDir, BOOTSTRAP_FILE_NAME);
}

/** CLI flag, then environment, then the pointer saved by `config set configDir`, then the default. */
export function resolveConfigDir(cliOverride?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (cliOverride) {
    return resolveUserPath(cliOverride);
  }

  const fromEnv = env[CONFIG_DIR_ENV];
  if (fromEnv) {
    return resolveUserPath(fromEnv);
  }

  const bootstrap = readJsonFileSync<BootstrapFile>(getBootstrapPath());
  if (bootstrap?.configDir) {
    return resolveUserPath(bootstrap.configDir);
  }

  return DEFAULT_CONFIG_DIR;
}

export function persistConfigDir(newConfigDir: string): void {
  const bootstrapPath = getBootstrapPath();
  ensureDirSync(path.dirname(bootstrapPath));
  writeJsonFileSync(bootstrapPath, { configDir: resolveUserPath(newConfigDir) });
}

/** Copies the state database into a new config dir unless one already lives there. */
export function copyDatabaseIfMissing(fromDir: string, toDir: string): boolean {
  const source = path.join(fromDir, DB_FILE_NAME);
  const destination = path.join(toDir, DB_FILE_NAME);
  if (!fs.existsSync(source) || fs.existsSync(destination)) {
    return false;
  }

  ensureDirSync(toDir);
  fs.copyFileSync(source, destination);
  return true;
}
