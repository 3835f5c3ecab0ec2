/**
 * Error types shared across the pipeline
 */

/**
 * Raised by a template renderer when a layout key was never loaded
 */
export class TemplateNotFoundError extends Error {
  constructor(readonly templateKey: string) {
    super(`Template '${templateKey}' not found or failed to load`);
    this.name = "TemplateNotFoundError";
  }
}

/**
 * Raised by storage backends for missing paths.
 * Carries the same `code` as Node's fs errors so callers can treat
 * every backend alike.
 */
export class StorageNotFoundError extends Error {
  readonly code = "ENOENT";

  constructor(readonly path: string) {
    super(`ENOENT: no such file or directory, '${path}'`);
    this.name = "StorageNotFoundError";
  }
}

/**
 * Raised by storage backends when a copy would overwrite an existing file
 */
export class StorageExistsError extends Error {
  readonly code = "EEXIST";

  constructor(readonly path: string) {
    super(`EEXIST: file already exists, '${path}'`);
    this.name = "StorageExistsError";
  }
}

/**
 * Check whether an error is the result of cooperative cancellation
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted && error === signal.reason) {
    return true;
  }
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Throw the signal's reason when the build was cancelled
 */
export function checkCancelled(signal?: AbortSignal): void {
  signal?.throwIfAborted();
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
