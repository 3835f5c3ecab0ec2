/**
 * Storage backends
 */

export { LocalStorage } from "./local";
export { MemoryStorage } from "./memory";
export { S3Storage } from "./s3";
export type { S3StorageOptions } from "./s3";
export { contentTypeFor } from "./content-types";
