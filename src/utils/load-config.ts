/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import envPaths from "env-paths";
import type { ConfigError, DumpConfig, PartialDumpConfig } from "../types";
import { DumpConfigSchema, PartialDumpConfigSchema } from "../types";
import { fileExists } from "./file-exists";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// OS-specific paths from env-paths (XDG base directories on Linux)
const paths = envPaths("il2cpp-dump", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/il2cpp-dump or ~/.config/il2cpp-dump
 * - macOS: ~/Library/Preferences/il2cpp-dump
 * - Windows: %APPDATA%\il2cpp-dump
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<DumpConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return DumpConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(configPath: string): Promise<PartialDumpConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialDumpConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: DumpConfig,
  override: PartialDumpConfig,
): DumpConfig {
  return {
    ...base,
    ...override,
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    solution: { ...base.solution, ...override.solution },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: DumpConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (await fileExists(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
