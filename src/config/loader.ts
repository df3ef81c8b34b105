// Config loader: reads ~/.config/sysbak/config.yaml and validates it against ConfigSchema.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// Keys missing from the file take their schema defaults.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { ConfigSchema, type SysbakConfig } from "./schema.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "sysbak");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

/** Default config YAML written on first run. */
export const DEFAULT_CONFIG_YAML = `# sysbak: configuration
# Generated automatically on first run. All values shown are defaults.

privilege:
  # Wrapper used for package installs that need root: sudo | doas
  method: sudo

storage:
  # The catalog is saved to <base_dir>/SysBackup/package_list.json
  base_dir: "."

execution:
  # 0 waits for every package manager command to finish
  command_timeout_seconds: 0

safety:
  confirmation_threshold: moderate
  dry_run_bypass_confirmation: true
`;

export interface ConfigResult {
  config: SysbakConfig;
  configPath: string;
  firstRun: boolean;
}

export function defaultConfig(): SysbakConfig {
  return ConfigSchema.parse({});
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: defaultConfig(), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = parseYaml(raw);
    const config = ConfigSchema.parse(parsed ?? {});
    return { config, configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config, using defaults");
    return { config: defaultConfig(), configPath, firstRun: false };
  }
}
