/**
 * File name pattern matching shared by every storage backend
 */

import { minimatch } from "minimatch";

/**
 * Match a file name (not a path) against a glob such as "*.md"
 */
export function matchesPattern(fileName: string, pattern: string): boolean {
  return minimatch(fileName, pattern, { dot: true });
}

export function baseName(path: string): string {
  const index = path.lastIndexOf("/");
  return index === -1 ? path : path.slice(index + 1);
}
