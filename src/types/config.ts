/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const TaxonomyPathsSchema = z.object({
  category: z.string(),
  tag: z.string(),
});

export const LayoutsSchema = z.object({
  post: z.string(),
  page: z.string(),
  list: z.string(), // Blog index pages
  taxonomy: z.string(), // Category and tag archive pages
});

export const FeedConfigSchema = z.object({
  enabled: z.boolean(),
  path: z.string(),
  maxItems: z.number().int().nonnegative(), // 0 = every post
});

export const SiteConfigSchema = z.object({
  baseUrl: z.string(),
  title: z.string(),
  description: z.string(),
  language: z.string(),
  // 0 disables pagination (one page per list)
  postsPerPage: z.number().int().nonnegative(),

  // Directory roles, relative to the source storage root
  contentDirectory: z.string(),
  postsDirectory: z.string(), // Relative to contentDirectory
  templateDirectory: z.string(),
  includesDirectory: z.string(),
  staticDirectory: z.string(),
  stylesDirectory: z.string(),
  styleEntryPoint: z.string(),
  styleOutputStyle: z.enum(["compressed", "expanded"]),
  outputDirectory: z.string(),

  // Permalink templates (:slug, :title, :year, :month, :day)
  postPermalink: z.string(),
  pagePermalink: z.string(),
  blogPath: z.string(),
  taxonomyPaths: TaxonomyPathsSchema,
  layouts: LayoutsSchema,

  buildDrafts: z.boolean(),
  buildFutureDated: z.boolean(),

  feed: FeedConfigSchema,
  // Built-in plugins to register, in order
  plugins: z.array(z.string()),
  // Free-form settings read by plugins and templates
  extensions: z.record(z.string(), z.unknown()),
});

// Partial schema for user/site configs (top-level AND nested properties optional)
export const PartialSiteConfigSchema = SiteConfigSchema.partial().extend({
  taxonomyPaths: TaxonomyPathsSchema.partial().optional(),
  layouts: LayoutsSchema.partial().optional(),
  feed: FeedConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type TaxonomyPaths = z.infer<typeof TaxonomyPathsSchema>;
export type LayoutsConfig = z.infer<typeof LayoutsSchema>;
export type FeedConfig = z.infer<typeof FeedConfigSchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type PartialSiteConfig = z.infer<typeof PartialSiteConfigSchema>;
export type StyleOutputStyle = SiteConfig["styleOutputStyle"];

export interface ConfigError {
  path: string;
  error: unknown;
}
