/**
 * Storage path helpers
 * Storage paths are "/"-separated, root-relative and never start or end with "/"
 */

/**
 * Normalize a storage path, resolving "." and ".." segments
 *
 * @example
 * normalizePath("/content//posts/./a.md") // "content/posts/a.md"
 * normalizePath("a/../b") // "b"
 */
export function normalizePath(path: string): string {
  const segments: string[] = [];

  for (const segment of path.replace(/\\/g, "/").split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  return segments.join("/");
}

export function joinPath(...segments: string[]): string {
  return normalizePath(segments.join("/"));
}

/**
 * Path of `path` relative to the directory `from`
 * Returns the normalized path unchanged when it is not below `from`.
 */
export function relativePath(from: string, path: string): string {
  const base = normalizePath(from);
  const target = normalizePath(path);

  if (base === "") return target;
  if (target === base) return "";
  if (target.startsWith(`${base}/`)) return target.slice(base.length + 1);
  return target;
}
