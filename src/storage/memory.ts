/**
 * Memory Storage
 * In-process storage backend, used for dry runs and tests
 */

import { Readable } from "node:stream";
import { StorageExistsError, StorageNotFoundError } from "../utils/errors";
import { joinPath, normalizePath } from "../utils/storage-path";
import { baseName, matchesPattern } from "./pattern";
import type { Storage } from "../types";

export class MemoryStorage implements Storage {
  private files = new Map<string, Uint8Array>();
  private directories = new Set<string>();

  constructor(initial: Record<string, string | Uint8Array> = {}) {
    for (const [path, data] of Object.entries(initial)) {
      this.files.set(normalizePath(path), toBytes(data));
    }
  }

  /** Every stored file path, sorted */
  paths(): string[] {
    return [...this.files.keys()].sort();
  }

  private read(path: string): Uint8Array {
    const data = this.files.get(normalizePath(path));
    if (!data) throw new StorageNotFoundError(path);
    return data;
  }

  async exists(path: string): Promise<boolean> {
    const target = normalizePath(path);
    if (target === "" || this.files.has(target) || this.directories.has(target)) {
      return true;
    }
    const prefix = `${target}/`;
    return [...this.files.keys()].some((key) => key.startsWith(prefix));
  }

  async readText(path: string): Promise<string> {
    return Buffer.from(this.read(path)).toString("utf-8");
  }

  async readBytes(path: string): Promise<Uint8Array> {
    return Uint8Array.from(this.read(path));
  }

  async openStream(path: string): Promise<Readable> {
    return Readable.from([Buffer.from(this.read(path))]);
  }

  async writeText(path: string, data: string): Promise<void> {
    this.files.set(normalizePath(path), toBytes(data));
  }

  async writeBytes(path: string, data: Uint8Array): Promise<void> {
    this.files.set(normalizePath(path), Uint8Array.from(data));
  }

  async writeStream(path: string, data: Readable): Promise<void> {
    const chunks: Buffer[] = [];
    for await (const chunk of data) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    this.files.set(normalizePath(path), Buffer.concat(chunks));
  }

  async listFiles(
    directory: string,
    pattern: string,
    recursive: boolean,
  ): Promise<string[]> {
    const base = normalizePath(directory);
    const prefix = base ? `${base}/` : "";

    return this.paths().filter((key) => {
      if (!key.startsWith(prefix)) return false;
      const rest = key.slice(prefix.length);
      if (!recursive && rest.includes("/")) return false;
      return matchesPattern(baseName(rest), pattern);
    });
  }

  async listDirectories(directory: string): Promise<string[]> {
    const base = normalizePath(directory);
    const prefix = base ? `${base}/` : "";
    const found = new Set<string>();

    for (const key of [...this.files.keys(), ...this.directories]) {
      if (!key.startsWith(prefix)) continue;
      const rest = key.slice(prefix.length);
      const slash = rest.indexOf("/");
      if (slash > 0) {
        found.add(joinPath(base, rest.slice(0, slash)));
      } else if (this.directories.has(key) && rest !== "") {
        found.add(key);
      }
    }

    return [...found].sort();
  }

  async createDirectory(path: string): Promise<void> {
    const target = normalizePath(path);
    if (target) this.directories.add(target);
  }

  async deleteFile(path: string): Promise<void> {
    this.files.delete(normalizePath(path));
  }

  async deleteDirectory(path: string, recursive: boolean): Promise<void> {
    const target = normalizePath(path);
    const prefix = target ? `${target}/` : "";
    const children = this.paths().filter((key) => key.startsWith(prefix));

    if (!recursive && children.length > 0) {
      throw new Error(`ENOTEMPTY: directory not empty, '${path}'`);
    }
    for (const key of children) {
      this.files.delete(key);
    }
    for (const dir of [...this.directories]) {
      if (dir === target || dir.startsWith(prefix)) this.directories.delete(dir);
    }
  }

  async copyFile(
    source: string,
    destination: string,
    overwrite: boolean,
  ): Promise<void> {
    const data = this.read(source);
    const target = normalizePath(destination);
    if (!overwrite && this.files.has(target)) {
      throw new StorageExistsError(destination);
    }
    this.files.set(target, Uint8Array.from(data));
  }

  combine(...segments: string[]): string {
    return joinPath(...segments);
  }
}

function toBytes(data: string | Uint8Array): Uint8Array {
  return typeof data === "string" ? Buffer.from(data, "utf-8") : Uint8Array.from(data);
}
