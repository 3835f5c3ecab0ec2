/**
 * Local Storage
 * Storage backend over a directory on local disk
 */

import glob from "fast-glob";
import {
  access,
  copyFile,
  mkdir,
  readFile,
  rm,
  rmdir,
  stat,
  writeFile,
} from "fs/promises";
import { constants, createReadStream, createWriteStream } from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { joinPath, normalizePath } from "../utils/storage-path";
import { baseName, matchesPattern } from "./pattern";
import type { Storage } from "../types";

/**
 * True when something exists at an absolute path; only ENOENT counts as absent
 */
async function fileExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export class LocalStorage implements Storage {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolve(relative: string): string {
    return path.join(this.root, normalizePath(relative));
  }

  private async ensureParent(relative: string): Promise<string> {
    const target = this.resolve(relative);
    await mkdir(path.dirname(target), { recursive: true });
    return target;
  }

  exists(relative: string): Promise<boolean> {
    return fileExists(this.resolve(relative));
  }

  readText(relative: string): Promise<string> {
    return readFile(this.resolve(relative), "utf-8");
  }

  readBytes(relative: string): Promise<Uint8Array> {
    return readFile(this.resolve(relative));
  }

  async openStream(relative: string): Promise<Readable> {
    const target = this.resolve(relative);
    // Surface ENOENT here rather than as a stream error
    await access(target, constants.R_OK);
    return createReadStream(target);
  }

  async writeText(relative: string, data: string): Promise<void> {
    await writeFile(await this.ensureParent(relative), data, "utf-8");
  }

  async writeBytes(relative: string, data: Uint8Array): Promise<void> {
    await writeFile(await this.ensureParent(relative), data);
  }

  async writeStream(relative: string, data: Readable): Promise<void> {
    await pipeline(data, createWriteStream(await this.ensureParent(relative)));
  }

  async listFiles(
    directory: string,
    pattern: string,
    recursive: boolean,
  ): Promise<string[]> {
    const cwd = this.resolve(directory);
    if (!(await fileExists(cwd))) return [];

    const entries = await glob(recursive ? "**/*" : "*", {
      cwd,
      onlyFiles: true,
      dot: true,
    });

    return entries
      .filter((entry) => matchesPattern(baseName(entry), pattern))
      .map((entry) => joinPath(directory, entry))
      .sort();
  }

  async listDirectories(directory: string): Promise<string[]> {
    const cwd = this.resolve(directory);
    if (!(await fileExists(cwd))) return [];

    const entries = await glob("*", { cwd, onlyDirectories: true, dot: true });
    return entries.map((entry) => joinPath(directory, entry)).sort();
  }

  async createDirectory(relative: string): Promise<void> {
    await mkdir(this.resolve(relative), { recursive: true });
  }

  async deleteFile(relative: string): Promise<void> {
    await rm(this.resolve(relative), { force: true });
  }

  async deleteDirectory(relative: string, recursive: boolean): Promise<void> {
    const target = this.resolve(relative);
    if (recursive) {
      await rm(target, { recursive: true, force: true });
    } else {
      await rmdir(target);
    }
  }

  async copyFile(
    source: string,
    destination: string,
    overwrite: boolean,
  ): Promise<void> {
    const target = await this.ensureParent(destination);
    await copyFile(
      this.resolve(source),
      target,
      overwrite ? 0 : constants.COPYFILE_EXCL,
    );
  }

  combine(...segments: string[]): string {
    return joinPath(...segments);
  }
}
