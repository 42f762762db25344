import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  MigrationConfig,
  PartialMigrationConfig,
} from "../types";
import {
  MigrationConfigSchema,
  PartialMigrationConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("media-migrator", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<MigrationConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return MigrationConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialMigrationConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialMigrationConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: MigrationConfig,
  override: PartialMigrationConfig,
): MigrationConfig {
  return {
    source: { ...base.source, ...override.source },
    images: { ...base.images, ...override.images },
    upload: { ...base.upload, ...override.upload },
    batch: { ...base.batch, ...override.batch },
    report: { ...base.report, ...override.report },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Apply environment variables (as loaded from .env) on top of the config.
 * Unset or empty variables leave the config value alone.
 */
export function applyEnvironment(
  config: MigrationConfig,
  env: NodeJS.ProcessEnv,
): MigrationConfig {
  const pick = (name: string): string | undefined => env[name] || undefined;

  return MigrationConfigSchema.parse({
    ...config,
    source: {
      ...config.source,
      server: pick("DB_SERVER") ?? config.source.server,
      database: pick("DB_DATABASE") ?? config.source.database,
      username: pick("DB_USERNAME") ?? config.source.username,
      password: pick("DB_PASSWORD") ?? config.source.password,
    },
    images: {
      ...config.images,
      directory: pick("IMAGE_DOWNLOAD_PATH") ?? config.images.directory,
    },
    upload: {
      ...config.upload,
      url: pick("UPLOAD_URL") ?? config.upload.url,
      apiKey: pick("API_KEY") ?? config.upload.apiKey,
    },
  });
}

interface LoadConfigResult {
  config: MigrationConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: environment > custom path > user config > default config
 */
export async function loadConfig(
  custom?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
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

  return { config: applyEnvironment(config, env), errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
