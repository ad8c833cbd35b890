import { readFile } from "fs/promises";
import { join } from "path";
import { existsSync } from "fs";
import envPaths from "env-paths";
import defaults from "../config/default.json";
import type {
  ConfigError,
  HarvesterConfig,
  PartialHarvesterConfig,
} from "../types";
import {
  HarvesterConfigSchema,
  PartialHarvesterConfigSchema,
} from "../types";

// OS-specific paths (follows XDG spec on Linux)
const paths = envPaths("image-harvester", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export function loadDefaultConfig(): HarvesterConfig {
  return HarvesterConfigSchema.parse(defaults);
}

async function loadPartialConfig(path: string): Promise<PartialHarvesterConfig> {
  const content = await readFile(path, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialHarvesterConfigSchema.parse(parsed);
}

async function loadUserConfig(
  userConfigPath: string,
): Promise<PartialHarvesterConfig | null> {
  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

export function mergeConfig(
  base: HarvesterConfig,
  override: PartialHarvesterConfig,
): HarvesterConfig {
  return {
    input: { ...base.input, ...override.input },
    download: { ...base.download, ...override.download },
    output: { ...base.output, ...override.output },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: HarvesterConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 */
export async function loadConfig(
  custom?: string,
  userConfigPath: string = getUserConfigPath(),
): Promise<LoadConfigResult> {
  let config = loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig(userConfigPath);
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: userConfigPath, error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
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
