/**
 * Utility exports
 */

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export type { LoadConfigOptions, LoadConfigResult } from "./load-config";

// Errors and tracking
export {
  TemplateNotFoundError,
  StorageNotFoundError,
  StorageExistsError,
  isCancellation,
  checkCancelled,
  errorMessage,
} from "./errors";
export { Tracker } from "./tracker";
export { Logger } from "./logger";
export type { LogLevel } from "./logger";

// URL and path utilities
export { slugify } from "./slugify";
export { normalizeUrl, urlToDestinationPath, absoluteUrl, hasFileExtension } from "./url";
export { normalizePath, joinPath, relativePath } from "./storage-path";
export { generateSummary } from "./summary";
