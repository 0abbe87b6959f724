import path from "node:path";
import { DbClient } from "../db/client.js";
import { resolveConfigDir } from "../config/bootstrap.js";
import { mergeConfig, parseConfigValue, stringifyConfigValue } from "../config/settings.js";
import type { AppConfig } from "../shared/types.js";

export interface AppContext {
  configDir: string;
  db: DbClient;
  /** Parses the stored config; throws ConfigError listing every invalid key. */
  loadConfig(): AppConfig;
  close(): void;
}

export function createAppContext(input: { configDirOverride?: string }): AppContext {
  const configDir = path.resolve(resolveConfigDir(input.configDirOverride));
  const db = new DbClient(configDir);
  let config: AppConfig | undefined;

  return {
    configDir,
    db,
    loadConfig() {
      config ??= mergeConfig(db.listConfigRaw());
      return config;
    },
    close() {
      db.close();
    }
  };
}

export function setAppConfigValue<K extends keyof AppConfig>(
  context: AppContext,
  key: K,
  rawValue: string
): AppConfig[K] {
  const parsed = parseConfigValue(key, rawValue);
  context.db.setConfigValueRaw(key, stringifyConfigValue(key, parsed));
  return parsed;
}
