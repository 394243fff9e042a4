import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { BuildConfig, ConfigError, PartialBuildConfig } from "../types";
import { BuildConfigSchema, PartialBuildConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("ebolg", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<BuildConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return BuildConfigSchema.parse(parsed);
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is unreadable or invalid
 */
async function loadPartialConfig(configPath: string): Promise<PartialBuildConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialBuildConfigSchema.parse(parsed);
}

export function mergeConfig(
  base: BuildConfig,
  override: PartialBuildConfig,
): BuildConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    site: { ...base.site, ...override.site },
    markdown: { ...base.markdown, ...override.markdown },
    styles: {
      // Merge selectors individually so a user config can restyle one element
      classes: {
        ...base.styles.classes,
        ...override.styles?.classes,
      },
    },
    stylesheet: { ...base.stylesheet, ...override.stylesheet },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: BuildConfig;
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
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  if (existsSync(userConfigPath)) {
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
