/**
 * URL Utilities
 * Pretty-URL normalization shared by the resolver, paginator and plugins
 */

/**
 * Check whether the last segment of a URL path carries a file extension
 *
 * @example
 * hasFileExtension("/feed.xml") // true
 * hasFileExtension("/blog/hello/") // false
 */
export function hasFileExtension(urlPath: string): boolean {
  const lastSegment = urlPath.split("/").pop() ?? "";
  return /\.[a-z0-9]+$/i.test(lastSegment);
}

/**
 * Normalize a URL path: single leading slash, no duplicate slashes,
 * trailing slash unless the path names a file
 *
 * @example
 * normalizeUrl("custom") // "/custom/"
 * normalizeUrl("//a//b") // "/a/b/"
 * normalizeUrl("/404.html") // "/404.html"
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim().replace(/\\/g, "/").replace(/^\/+|\/+$/g, "");
  const url = `/${trimmed}`.replace(/\/{2,}/g, "/");

  if (url === "/" || hasFileExtension(url)) {
    return url;
  }
  return `${url}/`;
}

/**
 * Map a site URL onto its output file path
 *
 * @example
 * urlToDestinationPath("/") // "index.html"
 * urlToDestinationPath("/custom/") // "custom/index.html"
 * urlToDestinationPath("/feed.xml") // "feed.xml"
 */
export function urlToDestinationPath(url: string): string {
  if (url === "/") return "index.html";

  const relative = url.replace(/^\/+/, "");
  if (hasFileExtension(url)) return relative;

  return relative.endsWith("/") ? `${relative}index.html` : `${relative}/index.html`;
}

/**
 * Join a base URL (e.g. "https://example.com") with a site path
 * Absolute URLs and an empty base are returned as given.
 */
export function absoluteUrl(baseUrl: string, path: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(path) || !baseUrl) {
    return path;
  }
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
