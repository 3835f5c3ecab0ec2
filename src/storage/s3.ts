/**
 * S3 Storage
 * Storage backend over an S3-compatible bucket. Directories are key
 * prefixes; they exist whenever at least one object lives below them.
 */

import {
  CopyObjectCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { Readable } from "node:stream";
import { StorageExistsError, StorageNotFoundError } from "../utils/errors";
import { joinPath, normalizePath, relativePath } from "../utils/storage-path";
import { contentTypeFor } from "./content-types";
import { baseName, matchesPattern } from "./pattern";
import type { Storage } from "../types";

export interface S3StorageOptions {
  client: S3Client;
  bucket: string;
  /** Key prefix acting as the storage root, e.g. "site/" */
  prefix?: string;
}

// DeleteObjects accepts at most 1000 keys per request
const DELETE_BATCH_SIZE = 1000;

export class S3Storage implements Storage {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor({ client, bucket, prefix = "" }: S3StorageOptions) {
    this.client = client;
    this.bucket = bucket;
    this.prefix = normalizePath(prefix);
  }

  private key(path: string): string {
    return joinPath(this.prefix, path);
  }

  private directoryKey(path: string): string {
    const key = this.key(path);
    return key ? `${key}/` : "";
  }

  private async getObject(path: string) {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: this.key(path) }),
      );
      if (!response.Body) throw new StorageNotFoundError(path);
      return response.Body;
    } catch (error) {
      if (isNotFound(error)) throw new StorageNotFoundError(path);
      throw error;
    }
  }

  /**
   * Every key below a prefix, following continuation tokens
   */
  private async listKeys(prefix: string, delimiter?: string) {
    const keys: string[] = [];
    const prefixes: string[] = [];
    let token: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          Delimiter: delimiter,
          ContinuationToken: token,
        }),
      );

      for (const object of response.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      for (const common of response.CommonPrefixes ?? []) {
        if (common.Prefix) prefixes.push(common.Prefix);
      }
      token = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (token);

    return { keys, prefixes };
  }

  async exists(path: string): Promise<boolean> {
    const key = this.key(path);
    if (key === "") return true;

    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key }),
      );
      return true;
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }

    // Not an object; it may still be a directory prefix
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: `${key}/`,
        MaxKeys: 1,
      }),
    );
    return (response.KeyCount ?? response.Contents?.length ?? 0) > 0;
  }

  async readText(path: string): Promise<string> {
    const body = await this.getObject(path);
    return body.transformToString("utf-8");
  }

  async readBytes(path: string): Promise<Uint8Array> {
    const body = await this.getObject(path);
    return body.transformToByteArray();
  }

  async openStream(path: string): Promise<Readable> {
    return Readable.from([Buffer.from(await this.readBytes(path))]);
  }

  async writeText(path: string, data: string): Promise<void> {
    await this.put(path, Buffer.from(data, "utf-8"));
  }

  async writeBytes(path: string, data: Uint8Array): Promise<void> {
    await this.put(path, data);
  }

  async writeStream(path: string, data: Readable): Promise<void> {
    // PutObject needs a known length, so buffer the stream first
    const chunks: Buffer[] = [];
    for await (const chunk of data) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    await this.put(path, Buffer.concat(chunks));
  }

  private async put(path: string, body: Uint8Array): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.key(path),
        Body: body,
        ContentType: contentTypeFor(path),
      }),
    );
  }

  async listFiles(
    directory: string,
    pattern: string,
    recursive: boolean,
  ): Promise<string[]> {
    const prefix = this.directoryKey(directory);
    const { keys } = await this.listKeys(prefix, recursive ? undefined : "/");

    return keys
      .filter((key) => !key.endsWith("/"))
      .filter((key) => matchesPattern(baseName(key), pattern))
      .map((key) => relativePath(this.prefix, key))
      .sort();
  }

  async listDirectories(directory: string): Promise<string[]> {
    const { prefixes } = await this.listKeys(this.directoryKey(directory), "/");
    return prefixes.map((prefix) => relativePath(this.prefix, prefix)).sort();
  }

  /**
   * Object stores have no directories; a prefix exists once something is written below it
   */
  async createDirectory(): Promise<void> {}

  async deleteFile(path: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: this.key(path) }),
    );
  }

  async deleteDirectory(path: string, recursive: boolean): Promise<void> {
    const prefix = this.directoryKey(path);
    const { keys } = await this.listKeys(prefix);

    if (!recursive && keys.length > 0) {
      throw new Error(`ENOTEMPTY: directory not empty, '${path}'`);
    }

    for (let i = 0; i < keys.length; i += DELETE_BATCH_SIZE) {
      const batch = keys.slice(i, i + DELETE_BATCH_SIZE);
      await this.client.send(
        new DeleteObjectsCommand({
          Bucket: this.bucket,
          Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
        }),
      );
    }
  }

  async copyFile(
    source: string,
    destination: string,
    overwrite: boolean,
  ): Promise<void> {
    if (!overwrite && (await this.exists(destination))) {
      throw new StorageExistsError(destination);
    }

    try {
      await this.client.send(
        new CopyObjectCommand({
          Bucket: this.bucket,
          CopySource: encodeURI(`${this.bucket}/${this.key(source)}`),
          Key: this.key(destination),
          ContentType: contentTypeFor(destination),
          MetadataDirective: "REPLACE",
        }),
      );
    } catch (error) {
      if (isNotFound(error)) throw new StorageNotFoundError(source);
      throw error;
    }
  }

  combine(...segments: string[]): string {
    return joinPath(...segments);
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "NotFound" || error.name === "NoSuchKey")
  );
}
