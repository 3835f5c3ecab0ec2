/**
 * Frontmatter extraction
 * Splits a content file into its YAML header and body, and normalizes the
 * recognised keys into Metadata. Unrecognised keys are kept in `extra`.
 */

import matter from "gray-matter";
import { z } from "zod";
import type { Metadata } from "../types";

// ============================================================================
// Value schemas
// ============================================================================

const textSchema = z.union([z.string(), z.number()]).transform(String);

const dateSchema = z
  .union([z.date(), z.string(), z.number()])
  .transform((value, ctx) => {
    const date = value instanceof Date ? value : new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: "custom", message: `Invalid date '${String(value)}'` });
      return z.NEVER;
    }
    return date;
  });

// Accepts "a, b" as well as [a, b]
const termListSchema = z
  .union([textSchema, z.array(textSchema)])
  .transform((value) => (Array.isArray(value) ? value : value.split(",")))
  .transform((terms) => terms.map((term) => term.trim()).filter(Boolean));

const FrontmatterSchema = z.object({
  title: textSchema.optional(),
  date: dateSchema.optional(),
  lastModified: dateSchema.optional(),
  layout: z.string().optional(),
  categories: termListSchema.optional(),
  tags: termListSchema.optional(),
  draft: z.boolean().optional(),
  url: z.string().optional(),
  slug: textSchema.optional(),
  summary: z.string().optional(),
});

type KnownKey = keyof z.input<typeof FrontmatterSchema>;

// Lookup by lower-cased key with "_" and "-" removed
const KNOWN_KEYS: Record<string, KnownKey> = {
  title: "title",
  date: "date",
  lastmodified: "lastModified",
  updated: "lastModified",
  layout: "layout",
  categories: "categories",
  category: "categories",
  tags: "tags",
  tag: "tags",
  draft: "draft",
  url: "url",
  permalink: "url",
  slug: "slug",
  summary: "summary",
  excerpt: "summary",
};

// ============================================================================
// Public API
// ============================================================================

export interface Frontmatter {
  metadata: Metadata;
  body: string;
}

/**
 * Split raw file text into metadata and body
 * Throws on malformed YAML or a recognised key with an unusable value.
 */
export function parseFrontmatter(raw: string): Frontmatter {
  const { data, content } = matter(raw);
  return { metadata: toMetadata(data), body: content };
}

export function toMetadata(data: Record<string, unknown>): Metadata {
  const known: Record<string, unknown> = {};
  const extra: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const canonical = KNOWN_KEYS[key.toLowerCase().replace(/[_-]/g, "")];
    if (!canonical) {
      extra[key] = value;
      continue;
    }
    // `title:` with no value is the same as no title
    if (value !== null && value !== undefined) known[canonical] = value;
  }

  const parsed = FrontmatterSchema.parse(known);

  return {
    ...parsed,
    categories: parsed.categories ?? [],
    tags: parsed.tags ?? [],
    draft: parsed.draft ?? false,
    extra,
  };
}
