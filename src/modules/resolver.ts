/**
 * Resolver Module
 * Computes the permalink and output path of a single content item
 */

import { slugify } from "../utils/slugify";
import { normalizeUrl, urlToDestinationPath } from "../utils/url";
import { relativePath } from "../utils/storage-path";
import type { Metadata, SiteConfig } from "../types";

export interface ResolveInput {
  kind: "post" | "page";
  sourcePath: string;
  metadata: Metadata;
  date?: Date; // Required for posts
}

export interface ResolvedLocation {
  url: string;
  destinationPath: string;
}

function fileStem(path: string): string {
  const name = path.split("/").pop() ?? "";
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

function parentName(path: string): string {
  const segments = path.split("/");
  return segments.length >= 2 ? segments[segments.length - 2] : "";
}

function isRootIndex(sourcePath: string, contentDirectory: string): boolean {
  return /^index\.[^/]+$/i.test(relativePath(contentDirectory, sourcePath));
}

/**
 * Slug from metadata.slug, else the title, else the file name
 * ("index" files are named after their parent directory)
 */
export function deriveSlug(item: Pick<ResolveInput, "sourcePath" | "metadata">): string {
  const explicit = item.metadata.slug?.trim();
  if (explicit) return slugify(explicit);

  const title = item.metadata.title?.trim();
  if (title) return slugify(title);

  const stem = fileStem(item.sourcePath);
  const name = stem.toLowerCase() === "index" ? parentName(item.sourcePath) : stem;
  return slugify(name);
}

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Substitute permalink placeholders, case-insensitively
 * Date parts come from the UTC calendar date.
 */
export function applyPermalink(template: string, slug: string, date?: Date): string {
  let url = template.replace(/:(slug|title)\b/gi, slug);

  if (date) {
    url = url
      .replace(/:year\b/gi, String(date.getUTCFullYear()))
      .replace(/:month\b/gi, pad(date.getUTCMonth() + 1))
      .replace(/:day\b/gi, pad(date.getUTCDate()));
  }

  return normalizeUrl(url);
}

/**
 * Resolve an item's URL and destination path
 *
 * 1. `metadata.url` wins and is only normalized
 * 2. the root index file of the content tree maps to "/"
 * 3. otherwise the permalink template is filled in with the slug and date
 *
 * @example
 * resolve(post, "/blog/:year/:month/:day/:slug/", config)
 * // { url: "/blog/2024/03/05/hello-go/", destinationPath: "blog/2024/03/05/hello-go/index.html" }
 */
export function resolve(
  item: ResolveInput,
  permalinkTemplate: string,
  config: Pick<SiteConfig, "contentDirectory">,
): ResolvedLocation {
  let url: string;

  const override = item.metadata.url?.trim();
  if (override) {
    url = normalizeUrl(override);
    // A trailing slash written by the author always means a directory
    if (override.endsWith("/") && !url.endsWith("/")) url = `${url}/`;
  } else if (isRootIndex(item.sourcePath, config.contentDirectory)) {
    url = "/";
  } else {
    const date = item.kind === "post" ? item.date : undefined;
    url = applyPermalink(permalinkTemplate, deriveSlug(item), date);
  }

  return { url, destinationPath: urlToDestinationPath(url) };
}
