/**
 * Configuration Loader
 * Layers defaults, the user config and the site config, then CLI overrides
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { ConfigError, PartialSiteConfig, SiteConfig, Storage } from "../types";
import { PartialSiteConfigSchema, SiteConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("sitesmith", { suffix: "" });

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<SiteConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return SiteConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(path: string): Promise<PartialSiteConfig | null> {
  if (!existsSync(path)) {
    return null;
  }

  const content = await readFile(path, "utf-8");
  return PartialSiteConfigSchema.parse(JSON.parse(content));
}

async function loadSiteConfig(
  storage: Storage,
  path: string,
): Promise<PartialSiteConfig | null> {
  if (!(await storage.exists(path))) {
    return null;
  }

  const content = await storage.readText(path);
  return PartialSiteConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: SiteConfig,
  override: PartialSiteConfig,
): SiteConfig {
  return {
    ...base,
    ...override,
    taxonomyPaths: { ...base.taxonomyPaths, ...override.taxonomyPaths },
    layouts: { ...base.layouts, ...override.layouts },
    feed: { ...base.feed, ...override.feed },
    plugins: override.plugins ?? base.plugins,
    extensions: { ...base.extensions, ...override.extensions },
  };
}

export interface LoadConfigOptions {
  /** Storage holding the site; the site config is read from it */
  storage: Storage;
  /** Site config path inside `storage` */
  configPath?: string;
  /** Applied last, e.g. from CLI flags */
  overrides?: PartialSiteConfig;
  /** Defaults to the OS config directory; null skips the user config */
  userConfigPath?: string | null;
}

export interface LoadConfigResult {
  config: SiteConfig;
  errors: ConfigError[];
  /** False when no site config file was found */
  siteConfigFound: boolean;
}

/**
 * Load and merge configuration
 * Priority: overrides > site config > user config > default config
 *
 * A user or site config that cannot be read, parsed or validated is
 * reported in `errors` and skipped; the remaining layers still apply.
 */
export async function loadConfig(
  options: LoadConfigOptions,
): Promise<LoadConfigResult> {
  const {
    storage,
    configPath = "config.json",
    overrides = {},
    userConfigPath = getUserConfigPath(),
  } = options;

  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];
  let siteConfigFound = false;

  if (userConfigPath) {
    try {
      const userConfig = await loadUserConfig(userConfigPath);
      if (userConfig) config = mergeConfig(config, userConfig);
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  try {
    const siteConfig = await loadSiteConfig(storage, configPath);
    if (siteConfig) {
      siteConfigFound = true;
      config = mergeConfig(config, siteConfig);
    }
  } catch (error) {
    siteConfigFound = true;
    errors.push({ path: configPath, error });
  }

  config = mergeConfig(config, overrides);
  config.baseUrl = config.baseUrl.replace(/\/+$/, "");

  return { config, errors, siteConfigFound };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}
