/**
 * Storage abstraction
 * Uniform async file operations over a root-relative namespace.
 * Paths are "/"-separated and never start with "/".
 */

import type { Readable } from "node:stream";

export interface Storage {
  /** True when a file or directory exists at the path */
  exists(path: string): Promise<boolean>;

  readText(path: string): Promise<string>;
  readBytes(path: string): Promise<Uint8Array>;
  openStream(path: string): Promise<Readable>;

  /** Writes create missing parent directories */
  writeText(path: string, data: string): Promise<void>;
  writeBytes(path: string, data: Uint8Array): Promise<void>;
  writeStream(path: string, data: Readable): Promise<void>;

  /**
   * List files below a directory whose file name matches a glob pattern
   * (e.g. "*.md"). Returns root-relative paths, sorted.
   */
  listFiles(path: string, pattern: string, recursive: boolean): Promise<string[]>;
  /** Immediate subdirectories, root-relative, sorted */
  listDirectories(path: string): Promise<string[]>;

  createDirectory(path: string): Promise<void>;
  deleteFile(path: string): Promise<void>;
  deleteDirectory(path: string, recursive: boolean): Promise<void>;
  copyFile(source: string, destination: string, overwrite: boolean): Promise<void>;

  combine(...segments: string[]): string;
}
